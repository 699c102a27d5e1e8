import { ZodError } from 'zod';

export class InputValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InputValidationError';
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): InputValidationError {
    const issues = error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new InputValidationError(message, issues);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class JudgeResponseError extends Error {
  readonly response: string;

  constructor(message: string, response: string) {
    super(message);
    this.name = 'JudgeResponseError';
    this.response = response;
  }
}
