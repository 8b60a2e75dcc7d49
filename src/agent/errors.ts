/**
 * Raised when an investigation cannot start: no reasoner, no evidence
 * sources, an invalid budget, or a provider without credentials.
 */
export class InvestigationConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvestigationConfigError';
  }
}
