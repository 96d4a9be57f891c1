import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SequelizeModule } from '@nestjs/sequelize';
import { AppController } from './app.controller';
import { LeaveModule } from './modules/leave/leave.module';
import { buildSequelizeOptions } from './config/database.config';

@Module({
  imports: [
    // Load env vars globally
    ConfigModule.forRoot({ isGlobal: true }),

    SequelizeModule.forRootAsync({
      inject: [ConfigService],
      useFactory: buildSequelizeOptions,
    }),
    LeaveModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
