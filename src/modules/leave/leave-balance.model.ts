import {
  Table,
  Column,
  Model,
  DataType,
  PrimaryKey,
  AutoIncrement,
  AllowNull,
  Default,
  Min,
  CreatedAt,
  UpdatedAt,
} from 'sequelize-typescript';
import { LeaveType } from './leave.types';

interface LeaveBalanceCreationAttributes {
  employeeId: string;
  leaveType: LeaveType;
  remainingDays: number;
}

@Table({
  tableName: 'leave_balances',
  timestamps: true,
  indexes: [{ unique: true, fields: ['employeeId', 'leaveType'] }],
})
export class LeaveBalance extends Model<LeaveBalance, LeaveBalanceCreationAttributes> {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Column(DataType.STRING(64))
  declare employeeId: string;

  @AllowNull(false)
  @Column({ type: DataType.ENUM(...Object.values(LeaveType)) })
  declare leaveType: LeaveType;

  // Whole days; only ever changed through LeaveBalanceService.
  @AllowNull(false)
  @Min(0)
  @Default(0)
  @Column(DataType.INTEGER)
  declare remainingDays: number;

  @CreatedAt
  declare createdAt: Date;

  @UpdatedAt
  declare updatedAt: Date;
}
