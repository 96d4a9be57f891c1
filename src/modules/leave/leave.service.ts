import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { LeaveRequest } from './leave.model';
import { LeaveBalanceService } from './leave-balance.service';
import {
  LEAVE_SUBMITTED_MESSAGE,
  LeaveConfirmation,
  LeaveFailure,
  LeaveFailureKind,
  LeaveResult,
  LeaveStatus,
  LeaveSubmission,
  LeaveType,
} from './leave.types';
import {
  inclusiveDayCount,
  parseCalendarDate,
} from '../../common/utils/date.util';

@Injectable()
export class LeaveService {
  private readonly logger = new Logger(LeaveService.name);

  constructor(
    @InjectModel(LeaveRequest)
    private readonly leaveRequestModel: typeof LeaveRequest,
    private readonly leaveBalanceService: LeaveBalanceService,
  ) {}

  /**
   * Validates a submission, debits the balance and records the accepted
   * request. Rules run in a fixed order and the first failure wins:
   * calendar-date format, date ordering, then balance.
   *
   * A rejected submission never touches the balance. If the request row
   * cannot be written after a successful debit, the debit is credited back
   * and the storage error is rethrown.
   */
  async submitLeaveRequest(
    submission: LeaveSubmission,
  ): Promise<LeaveResult<LeaveConfirmation>> {
    const { employeeId, leaveType, startDate, endDate } = submission;
    this.logger.log(
      `Leave submission | employeeId=${employeeId} leaveType=${leaveType} range=${startDate}..${endDate}`,
    );

    const start = parseCalendarDate(startDate);
    const end = parseCalendarDate(endDate);
    if (start === null || end === null) {
      return this.reject(employeeId, {
        kind: LeaveFailureKind.MALFORMED_REQUEST,
        message: 'startDate and endDate must be calendar dates in YYYY-MM-DD format',
      });
    }

    if (end < start) {
      return this.reject(employeeId, {
        kind: LeaveFailureKind.INVALID_DATE_RANGE,
        message: 'End date cannot be before start date',
      });
    }

    const days = inclusiveDayCount(start, end);
    const debit = await this.leaveBalanceService.debit(employeeId, leaveType, days);
    if (!debit.ok) {
      return this.reject(employeeId, debit.error);
    }

    let leaveRequest: LeaveRequest;
    try {
      leaveRequest = await this.leaveRequestModel.create({
        employeeId,
        leaveType,
        startDate,
        endDate,
        days,
        status: LeaveStatus.ACCEPTED,
      });
    } catch (err: unknown) {
      await this.restoreBalance(employeeId, leaveType, days);
      throw err;
    }

    this.logger.log(
      `Leave request accepted id=${leaveRequest.id} | employeeId=${employeeId} days=${days}`,
    );
    return {
      ok: true,
      value: { requestId: leaveRequest.id, message: LEAVE_SUBMITTED_MESSAGE },
    };
  }

  async getLeaveRequest(id: string): Promise<LeaveRequest> {
    const leaveRequest = await this.leaveRequestModel.findByPk(id);
    if (!leaveRequest) {
      throw new NotFoundException('Leave request not found');
    }
    return leaveRequest;
  }

  async listLeaveRequests(employeeId: string): Promise<LeaveRequest[]> {
    return this.leaveRequestModel.findAll({
      where: { employeeId },
      order: [
        ['createdAt', 'DESC'],
        ['startDate', 'DESC'],
      ],
    });
  }

  private async restoreBalance(
    employeeId: string,
    leaveType: LeaveType,
    days: number,
  ): Promise<void> {
    try {
      const credit = await this.leaveBalanceService.credit(employeeId, leaveType, days);
      if (!credit.ok) {
        this.logger.error(
          `Could not restore ${days} day(s) for employeeId=${employeeId}: ${credit.error.message}`,
        );
        return;
      }
      this.logger.warn(
        `Request insert failed; restored ${days} day(s) | employeeId=${employeeId} leaveType=${leaveType}`,
      );
    } catch (err: unknown) {
      const reason = err instanceof Error ? err : new Error(String(err));
      this.logger.error(
        `Could not restore ${days} day(s) for employeeId=${employeeId}: ${reason.message}`,
        reason.stack,
      );
    }
  }

  private reject(
    employeeId: string,
    error: LeaveFailure,
  ): { ok: false; error: LeaveFailure } {
    this.logger.warn(
      `Leave submission rejected | employeeId=${employeeId} kind=${error.kind}: ${error.message}`,
    );
    return { ok: false, error };
  }
}
