import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseEnumPipe,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LeaveService } from './leave.service';
import { LeaveBalanceService } from './leave-balance.service';
import { LeaveRequest } from './leave.model';
import { ApplyLeaveDto } from './dto/apply-leave.dto';
import {
  ListLeaveRequestsQueryDto,
  SetLeaveBalanceDto,
} from './dto/leave-balance.dto';
import { toHttpException } from './leave.errors';
import { LeaveBalanceView, LeaveConfirmation, LeaveType } from './leave.types';

@ApiTags('Leave Management')
@Controller('leave')
export class LeaveController {
  private readonly logger = new Logger(LeaveController.name);

  constructor(
    private readonly leaveService: LeaveService,
    private readonly leaveBalanceService: LeaveBalanceService,
  ) {}

  @Post('apply')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Apply for leave' })
  @ApiResponse({ status: 201, description: 'Leave request submitted successfully' })
  @ApiResponse({ status: 400, description: 'Malformed request or end date before start date' })
  @ApiResponse({ status: 404, description: 'No balance recorded for the employee and leave type' })
  @ApiResponse({ status: 422, description: 'Insufficient leave balance' })
  async applyForLeave(@Body() dto: ApplyLeaveDto): Promise<LeaveConfirmation> {
    const result = await this.leaveService.submitLeaveRequest(dto);
    if (!result.ok) {
      throw toHttpException(result.error);
    }
    this.logger.log(`POST /leave/apply success | id=${result.value.requestId}`);
    return result.value;
  }

  @Get('requests')
  @ApiOperation({ summary: 'List accepted leave requests of an employee' })
  listLeaveRequests(
    @Query() query: ListLeaveRequestsQueryDto,
  ): Promise<LeaveRequest[]> {
    return this.leaveService.listLeaveRequests(query.employeeId);
  }

  @Get('requests/:id')
  @ApiOperation({ summary: 'Get a leave request by id' })
  @ApiResponse({ status: 404, description: 'Leave request not found' })
  getLeaveRequest(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
  ): Promise<LeaveRequest> {
    return this.leaveService.getLeaveRequest(id);
  }

  @Get('balance/:employeeId')
  @ApiOperation({ summary: 'Get all leave balances of an employee' })
  @ApiResponse({ status: 404, description: 'No balance recorded for the employee' })
  async listBalances(
    @Param('employeeId') employeeId: string,
  ): Promise<LeaveBalanceView[]> {
    const result = await this.leaveBalanceService.listBalances(employeeId);
    if (!result.ok) {
      throw toHttpException(result.error);
    }
    return result.value;
  }

  @Get('balance/:employeeId/:leaveType')
  @ApiOperation({ summary: 'Get the remaining days of one leave type' })
  @ApiResponse({ status: 404, description: 'No balance recorded for the employee and leave type' })
  async getBalance(
    @Param('employeeId') employeeId: string,
    @Param('leaveType', new ParseEnumPipe(LeaveType)) leaveType: LeaveType,
  ): Promise<LeaveBalanceView> {
    const result = await this.leaveBalanceService.getBalance(employeeId, leaveType);
    if (!result.ok) {
      throw toHttpException(result.error);
    }
    return { employeeId, leaveType, remainingDays: result.value };
  }

  @Put('balance')
  @ApiOperation({ summary: 'Create or overwrite a leave balance' })
  setBalance(@Body() dto: SetLeaveBalanceDto): Promise<LeaveBalanceView> {
    this.logger.log(
      `PUT /leave/balance | employeeId=${dto.employeeId} leaveType=${dto.leaveType}`,
    );
    return this.leaveBalanceService.setBalance(
      dto.employeeId,
      dto.leaveType,
      dto.remainingDays,
    );
  }
}
