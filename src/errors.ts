export class NavConfigError extends Error {
  constructor(message: string, public readonly exitCode: number = 2) {
    super(message);
    this.name = 'NavConfigError';
  }
}

export class NavOutputError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = 'NavOutputError';
  }
}
