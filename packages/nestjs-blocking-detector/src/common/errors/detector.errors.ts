export class DetectorError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'DetectorError';
  }
}

export class InvalidPoisonIdError extends DetectorError {
  constructor(public readonly poisonId: number, maxId: number) {
    super(`Poison id ${poisonId} is not an integer in [0, ${maxId}]`, 'INVALID_POISON_ID');
    this.name = 'InvalidPoisonIdError';
  }
}

export class UnknownFormulaError extends DetectorError {
  constructor(public readonly formulaId: string) {
    super(`Formula ${formulaId} is not registered`, 'UNKNOWN_FORMULA');
    this.name = 'UnknownFormulaError';
  }
}

export class ConfigurationError extends DetectorError {
  constructor(message: string, public readonly violations: string[] = []) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}
