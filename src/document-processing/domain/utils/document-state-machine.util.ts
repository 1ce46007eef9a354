import { ProcessingStatus } from '../enums/processing-status.enum';
import { ValidationError } from '../../../utils/errors/domain.error';

/**
 * Document State Machine Utility
 *
 * Valid Transitions:
 * - PENDING → UPLOADED → OCR_COMPLETED → COMPLETED
 * - any non-terminal state → FAILED
 *
 * COMPLETED and FAILED are terminal.
 */
export class DocumentStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    ProcessingStatus,
    ProcessingStatus[]
  > = new Map([
    [
      ProcessingStatus.PENDING,
      [ProcessingStatus.UPLOADED, ProcessingStatus.FAILED],
    ],
    [
      ProcessingStatus.UPLOADED,
      [ProcessingStatus.OCR_COMPLETED, ProcessingStatus.FAILED],
    ],
    [
      ProcessingStatus.OCR_COMPLETED,
      [ProcessingStatus.COMPLETED, ProcessingStatus.FAILED],
    ],
  ]);

  static isValidTransition(
    fromStatus: ProcessingStatus,
    toStatus: ProcessingStatus,
  ): boolean {
    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  /**
   * @throws ValidationError if transition is invalid
   */
  static validateTransition(
    fromStatus: ProcessingStatus,
    toStatus: ProcessingStatus,
  ): void {
    if (!this.isValidTransition(fromStatus, toStatus)) {
      throw new ValidationError(
        `Invalid state transition: ${fromStatus} → ${toStatus}. ` +
          `Valid transitions from ${fromStatus}: ${this.getValidTargetStates(fromStatus).join(', ') || 'none'}`,
      );
    }
  }

  static getValidTargetStates(fromStatus: ProcessingStatus): ProcessingStatus[] {
    return this.VALID_TRANSITIONS.get(fromStatus) || [];
  }
}
