export enum BatchStatus {
  COMPLETED = 'completed',
  PARTIAL_SUCCESS = 'partial_success',
  FAILED = 'failed',
}
