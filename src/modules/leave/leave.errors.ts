import {
  BadRequestException,
  HttpException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { domainFailureResponse } from '../../common/exceptions/domain-failure';
import { LeaveFailure, LeaveFailureKind } from './leave.types';

export function toHttpException(failure: LeaveFailure): HttpException {
  const body = domainFailureResponse(failure.kind, failure.message);
  switch (failure.kind) {
    case LeaveFailureKind.MALFORMED_REQUEST:
    case LeaveFailureKind.INVALID_DATE_RANGE:
      return new BadRequestException(body);
    case LeaveFailureKind.UNKNOWN_EMPLOYEE:
      return new NotFoundException(body);
    case LeaveFailureKind.INSUFFICIENT_BALANCE:
      return new UnprocessableEntityException(body);
  }
}
