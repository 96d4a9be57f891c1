import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { LeaveType } from '../leave.types';
import { trim } from './apply-leave.dto';

export class SetLeaveBalanceDto {
  @ApiProperty({ example: 'E1' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  employeeId!: string;

  @ApiProperty({ enum: LeaveType, example: LeaveType.ANNUAL })
  @IsEnum(LeaveType)
  leaveType!: LeaveType;

  @ApiProperty({ example: 10, minimum: 0 })
  @IsInt()
  @Min(0)
  remainingDays!: number;
}

export class ListLeaveRequestsQueryDto {
  @ApiProperty({ example: 'E1' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  employeeId!: string;
}
