import {
  Table,
  Column,
  Model,
  DataType,
  Default,
  PrimaryKey,
  AllowNull,
  CreatedAt,
} from 'sequelize-typescript';
import { LeaveType, LeaveStatus } from './leave.types';

interface LeaveRequestCreationAttributes {
  employeeId: string;
  leaveType: LeaveType;
  startDate: string;
  endDate: string;
  days: number;
  status: LeaveStatus;
}

// Rows are written once on acceptance and never updated, hence no updatedAt.
@Table({
  tableName: 'leave_requests',
  timestamps: true,
  updatedAt: false,
  indexes: [{ fields: ['employeeId'] }],
})
export class LeaveRequest extends Model<LeaveRequest, LeaveRequestCreationAttributes> {
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column({ type: DataType.UUID })
  declare id: string;

  @AllowNull(false)
  @Column(DataType.STRING(64))
  declare employeeId: string;

  @AllowNull(false)
  @Column({ type: DataType.ENUM(...Object.values(LeaveType)) })
  declare leaveType: LeaveType;

  @AllowNull(false)
  @Column(DataType.DATEONLY)
  declare startDate: string;

  @AllowNull(false)
  @Column(DataType.DATEONLY)
  declare endDate: string;

  @AllowNull(false)
  @Column(DataType.INTEGER)
  declare days: number;

  @AllowNull(false)
  @Column({ type: DataType.ENUM(...Object.values(LeaveStatus)) })
  declare status: LeaveStatus;

  @CreatedAt
  declare createdAt: Date;
}
