import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsDateString,
  IsEnum,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { LeaveType } from '../leave.types';
import { CALENDAR_DATE_PATTERN } from '../../../common/utils/date.util';

export const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class ApplyLeaveDto {
  @ApiProperty({ example: 'E1' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  employeeId!: string;

  @ApiProperty({ enum: LeaveType, example: LeaveType.ANNUAL })
  @IsEnum(LeaveType)
  leaveType!: LeaveType;

  @ApiProperty({ example: '2024-06-01', description: 'ISO-8601 calendar date' })
  @Matches(CALENDAR_DATE_PATTERN, {
    message: 'startDate must be a calendar date in YYYY-MM-DD format',
  })
  @IsDateString({ strict: true })
  startDate!: string;

  @ApiProperty({ example: '2024-06-03', description: 'ISO-8601 calendar date, inclusive' })
  @Matches(CALENDAR_DATE_PATTERN, {
    message: 'endDate must be a calendar date in YYYY-MM-DD format',
  })
  @IsDateString({ strict: true })
  endDate!: string;
}
