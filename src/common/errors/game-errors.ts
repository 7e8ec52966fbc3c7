// 에러 분류: 계약 위반(버그)은 잡지 않고 전파, 협력자 실패는 GameError 코드로 구분

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
    this.name = 'InvalidInputError';
  }
}

/** 호출자 버그 — 잘못된 레벨, 알 수 없는 난이도, 깨진 상태 변경 묶음 */
export class ContractViolationError extends GameError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONTRACT_VIOLATION', message, details);
    this.name = 'ContractViolationError';
  }
}

export class NarrativeUnavailableError extends GameError {
  constructor(message = 'Narrative generator unavailable', details?: Record<string, unknown>) {
    super('NARRATIVE_UNAVAILABLE', message, details);
    this.name = 'NarrativeUnavailableError';
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, details);
    this.name = 'InternalError';
  }
}

/** 계약 조건 검사 — 실패 시 ContractViolationError */
export function invariant(
  condition: boolean,
  message: string,
  details?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message, details);
  }
}
