export class ParseError extends Error {
  readonly line: number;

  readonly detail: string;

  constructor(line: number, detail: string) {
    super(`line ${line}: ${detail}`);
    this.name = 'ParseError';
    this.line = line;
    this.detail = detail;
  }
}

export class EncodeError extends Error {
  readonly detail: string;

  constructor(detail: string) {
    super(`encode error: ${detail}`);
    this.name = 'EncodeError';
    this.detail = detail;
  }
}

export class TimecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimecodeError';
  }
}

export class OtioError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OtioError';
  }
}
