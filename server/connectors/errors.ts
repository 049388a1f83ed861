/** Fatal for the run; the entry point logs it and exits non-zero. */
export class EngineRunError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = 'EngineRunError';
  }
}

export class RegistrationError extends EngineRunError {
  constructor(message: string, readonly status: number | null = null) {
    super(message, 'REGISTRATION_FAILED');
    this.name = 'RegistrationError';
  }
}

export class ConnectionError extends EngineRunError {
  constructor(message: string, readonly channel: string) {
    super(message, 'CONNECTION_FAILED');
    this.name = 'ConnectionError';
  }
}
