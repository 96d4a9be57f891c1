export enum LeaveType {
  ANNUAL = 'annual',
  SICK = 'sick',
  CASUAL = 'casual',
  UNPAID = 'unpaid',
  MATERNITY = 'maternity',
  PATERNITY = 'paternity',
}

export enum LeaveStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
}

export enum LeaveFailureKind {
  MALFORMED_REQUEST = 'MalformedRequest',
  INVALID_DATE_RANGE = 'InvalidDateRange',
  INSUFFICIENT_BALANCE = 'InsufficientBalance',
  UNKNOWN_EMPLOYEE = 'UnknownEmployee',
}

export interface LeaveFailure {
  kind: LeaveFailureKind;
  message: string;
}

// Business rejections travel as values; storage faults are thrown.
export type LeaveResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LeaveFailure };

export interface LeaveSubmission {
  employeeId: string;
  leaveType: LeaveType;
  startDate: string;
  endDate: string;
}

export interface LeaveConfirmation {
  requestId: string;
  message: string;
}

export interface LeaveBalanceView {
  employeeId: string;
  leaveType: LeaveType;
  remainingDays: number;
}

export const LEAVE_SUBMITTED_MESSAGE = 'Leave request submitted successfully.';
