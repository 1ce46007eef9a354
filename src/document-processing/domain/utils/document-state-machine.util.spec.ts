import { DocumentStateMachine } from './document-state-machine.util';
import { ProcessingStatus } from '../enums/processing-status.enum';
import { ValidationError } from '../../../utils/errors/domain.error';

describe('DocumentStateMachine', () => {
  it('should allow the linear pipeline order', () => {
    expect(
      DocumentStateMachine.isValidTransition(
        ProcessingStatus.PENDING,
        ProcessingStatus.UPLOADED,
      ),
    ).toBe(true);
    expect(
      DocumentStateMachine.isValidTransition(
        ProcessingStatus.UPLOADED,
        ProcessingStatus.OCR_COMPLETED,
      ),
    ).toBe(true);
    expect(
      DocumentStateMachine.isValidTransition(
        ProcessingStatus.OCR_COMPLETED,
        ProcessingStatus.COMPLETED,
      ),
    ).toBe(true);
  });

  it('should allow failing from any non-terminal state', () => {
    for (const status of [
      ProcessingStatus.PENDING,
      ProcessingStatus.UPLOADED,
      ProcessingStatus.OCR_COMPLETED,
    ]) {
      expect(
        DocumentStateMachine.isValidTransition(status, ProcessingStatus.FAILED),
      ).toBe(true);
    }
  });

  it('should not skip states', () => {
    expect(
      DocumentStateMachine.isValidTransition(
        ProcessingStatus.PENDING,
        ProcessingStatus.COMPLETED,
      ),
    ).toBe(false);
  });

  it('should never leave a terminal state', () => {
    expect(
      DocumentStateMachine.getValidTargetStates(ProcessingStatus.COMPLETED),
    ).toEqual([]);
    expect(
      DocumentStateMachine.getValidTargetStates(ProcessingStatus.FAILED),
    ).toEqual([]);
    expect(() =>
      DocumentStateMachine.validateTransition(
        ProcessingStatus.FAILED,
        ProcessingStatus.UPLOADED,
      ),
    ).toThrow(ValidationError);
  });

  it('should not allow moving backwards', () => {
    expect(() =>
      DocumentStateMachine.validateTransition(
        ProcessingStatus.OCR_COMPLETED,
        ProcessingStatus.UPLOADED,
      ),
    ).toThrow('Invalid state transition: ocr_completed → uploaded');
  });
});
