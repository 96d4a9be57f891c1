import { Test, TestingModule } from '@nestjs/testing';
import { SequelizeModule } from '@nestjs/sequelize';
import { LeaveModule } from './leave.module';

/**
 * LeaveModule wired to a fresh in-memory SQLite database; tables are
 * created from the models on init.
 */
export function createLeaveTestingModule(): Promise<TestingModule> {
  return Test.createTestingModule({
    imports: [
      SequelizeModule.forRoot({
        dialect: 'sqlite',
        storage: ':memory:',
        autoLoadModels: true,
        synchronize: true,
        logging: false,
      }),
      LeaveModule,
    ],
  }).compile();
}
