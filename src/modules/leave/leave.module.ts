import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { LeaveController } from './leave.controller';
import { LeaveService } from './leave.service';
import { LeaveBalanceService } from './leave-balance.service';
import { LeaveRequest } from './leave.model';
import { LeaveBalance } from './leave-balance.model';

@Module({
  imports: [SequelizeModule.forFeature([LeaveRequest, LeaveBalance])],
  controllers: [LeaveController],
  providers: [LeaveService, LeaveBalanceService],
  exports: [LeaveService, LeaveBalanceService],
})
export class LeaveModule {}
