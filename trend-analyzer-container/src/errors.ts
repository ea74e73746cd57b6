/**
 * Error Types
 *
 * Contract violations are caller bugs: they are thrown at the stage boundary
 * and never retried. Data-quality problems are not errors and never appear
 * here; they travel as flags and recommendations in the assembled context.
 */

export interface ContractIssue {
  path: string;
  message: string;
  code: string;
}

export class ContractViolationError extends Error {
  readonly contract: string;

  constructor(message: string, contract: string) {
    super(message);
    this.name = 'ContractViolationError';
    this.contract = contract;
  }
}

export class InvalidTaskError extends ContractViolationError {
  readonly task: string;
  readonly validTasks: readonly string[];

  constructor(task: string, validTasks: readonly string[]) {
    super(`Unknown task "${task}". Valid tasks: ${validTasks.join(', ')}`, 'task');
    this.name = 'InvalidTaskError';
    this.task = task;
    this.validTasks = validTasks;
  }
}

export class MalformedRecordError extends ContractViolationError {
  readonly issues: ContractIssue[];

  constructor(message: string, issues: ContractIssue[]) {
    super(message, 'trends_record');
    this.name = 'MalformedRecordError';
    this.issues = issues;
  }
}

export class ConfigurationError extends ContractViolationError {
  readonly variable: string;

  constructor(variable: string, value: string, reason: string) {
    super(`Invalid value "${value}" for ${variable}: ${reason}`, 'environment');
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}

/**
 * Raised when the trends service cannot be reached or answers with an error.
 */
export class TrendsSourceError extends Error {
  readonly keyword: string;
  readonly status?: number;

  constructor(message: string, keyword: string, status?: number) {
    super(message);
    this.name = 'TrendsSourceError';
    this.keyword = keyword;
    this.status = status;
  }
}

export class CompetitorSearchError extends Error {
  readonly query: string;
  readonly status?: number;

  constructor(message: string, query: string, status?: number) {
    super(message);
    this.name = 'CompetitorSearchError';
    this.query = query;
    this.status = status;
  }
}

export class GenerationError extends Error {
  readonly task: string;

  constructor(message: string, task: string) {
    super(message);
    this.name = 'GenerationError';
    this.task = task;
  }
}
