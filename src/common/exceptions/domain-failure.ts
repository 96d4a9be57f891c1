/**
 * Body of an HttpException raised for a business-rule rejection. `error`
 * carries the failure kind, which the exception filter reports as-is.
 */
export interface DomainFailureResponse {
  domainFailure: true;
  error: string;
  message: string;
}

export function domainFailureResponse(
  kind: string,
  message: string,
): DomainFailureResponse {
  return { domainFailure: true, error: kind, message };
}

export function isDomainFailureResponse(
  value: unknown,
): value is DomainFailureResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'domainFailure' in value &&
    value.domainFailure === true &&
    'error' in value &&
    typeof value.error === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}
