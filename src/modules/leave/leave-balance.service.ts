import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, literal } from 'sequelize';
import { LeaveBalance } from './leave-balance.model';
import {
  LeaveBalanceView,
  LeaveFailure,
  LeaveFailureKind,
  LeaveResult,
  LeaveType,
} from './leave.types';

/**
 * Authoritative store of remaining leave days per (employee, leave type).
 *
 * Debits and credits are single conditional UPDATE statements, so two
 * concurrent debits on the same key are serialized by the database row lock
 * and can never take the balance below zero. Different keys never contend.
 */
@Injectable()
export class LeaveBalanceService {
  private readonly logger = new Logger(LeaveBalanceService.name);

  constructor(
    @InjectModel(LeaveBalance)
    private readonly leaveBalanceModel: typeof LeaveBalance,
  ) {}

  async getBalance(
    employeeId: string,
    leaveType: LeaveType,
  ): Promise<LeaveResult<number>> {
    const balance = await this.findBalance(employeeId, leaveType);
    if (!balance) {
      return { ok: false, error: unknownEmployee(employeeId, leaveType) };
    }
    return { ok: true, value: balance.remainingDays };
  }

  async listBalances(
    employeeId: string,
  ): Promise<LeaveResult<LeaveBalanceView[]>> {
    const balances = await this.leaveBalanceModel.findAll({
      where: { employeeId },
      order: [['leaveType', 'ASC']],
    });
    if (balances.length === 0) {
      return {
        ok: false,
        error: {
          kind: LeaveFailureKind.UNKNOWN_EMPLOYEE,
          message: `No leave balance recorded for employee ${employeeId}`,
        },
      };
    }
    return { ok: true, value: balances.map(toView) };
  }

  /** Removes `days` from the balance only if at least that many remain. */
  async debit(
    employeeId: string,
    leaveType: LeaveType,
    days: number,
  ): Promise<LeaveResult<number>> {
    assertWholeDays(days);

    const [affected] = await this.leaveBalanceModel.update(
      { remainingDays: literal(`"remainingDays" - ${days}`) },
      {
        where: {
          employeeId,
          leaveType,
          remainingDays: { [Op.gte]: days },
        },
      },
    );

    if (affected > 0) {
      this.logger.log(
        `Debited ${days} day(s) | employeeId=${employeeId} leaveType=${leaveType}`,
      );
      return { ok: true, value: days };
    }

    const balance = await this.findBalance(employeeId, leaveType);
    if (!balance) {
      return { ok: false, error: unknownEmployee(employeeId, leaveType) };
    }
    return {
      ok: false,
      error: {
        kind: LeaveFailureKind.INSUFFICIENT_BALANCE,
        message: `Insufficient ${leaveType} leave balance: requested ${days} day(s), ${balance.remainingDays} remaining`,
      },
    };
  }

  /** Returns days to the balance; used to undo a debit. */
  async credit(
    employeeId: string,
    leaveType: LeaveType,
    days: number,
  ): Promise<LeaveResult<number>> {
    assertWholeDays(days);

    const [affected] = await this.leaveBalanceModel.update(
      { remainingDays: literal(`"remainingDays" + ${days}`) },
      { where: { employeeId, leaveType } },
    );

    if (affected === 0) {
      return { ok: false, error: unknownEmployee(employeeId, leaveType) };
    }
    this.logger.log(
      `Credited ${days} day(s) | employeeId=${employeeId} leaveType=${leaveType}`,
    );
    return { ok: true, value: days };
  }

  // Administrative seeding; overwrites whatever is recorded for the pair.
  // A single INSERT .. ON CONFLICT, so concurrent seeds of a new pair both land.
  async setBalance(
    employeeId: string,
    leaveType: LeaveType,
    remainingDays: number,
  ): Promise<LeaveBalanceView> {
    if (!Number.isInteger(remainingDays) || remainingDays < 0) {
      throw new RangeError(
        `remainingDays must be a non-negative integer, got ${remainingDays}`,
      );
    }

    await this.leaveBalanceModel.upsert(
      { employeeId, leaveType, remainingDays },
      { conflictFields: ['employeeId', 'leaveType'] },
    );

    this.logger.log(
      `Balance set | employeeId=${employeeId} leaveType=${leaveType} remainingDays=${remainingDays}`,
    );
    return { employeeId, leaveType, remainingDays };
  }

  private findBalance(
    employeeId: string,
    leaveType: LeaveType,
  ): Promise<LeaveBalance | null> {
    return this.leaveBalanceModel.findOne({ where: { employeeId, leaveType } });
  }
}

function assertWholeDays(days: number): void {
  if (!Number.isInteger(days) || days <= 0) {
    throw new RangeError(`days must be a positive integer, got ${days}`);
  }
}

function unknownEmployee(employeeId: string, leaveType: LeaveType): LeaveFailure {
  return {
    kind: LeaveFailureKind.UNKNOWN_EMPLOYEE,
    message: `No ${leaveType} leave balance recorded for employee ${employeeId}`,
  };
}

function toView(balance: LeaveBalance): LeaveBalanceView {
  return {
    employeeId: balance.employeeId,
    leaveType: balance.leaveType,
    remainingDays: balance.remainingDays,
  };
}
