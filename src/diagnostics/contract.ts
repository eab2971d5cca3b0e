// Producer-side invariant violations. These are programmer errors in whoever
// built the IR; the printer never recovers from them.

export enum ContractCode {
  C001_EmptyTraitParameters = 'C001',
}

export class ContractViolation extends Error {
  public readonly code: ContractCode;

  constructor(code: ContractCode, message: string) {
    super(`[${code}] ${message}`);
    this.code = code;
    this.name = 'ContractViolation';
  }
}

