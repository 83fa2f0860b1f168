export type Role = 'human' | 'assistant';

export type ExecutionErrorKind = 'execution' | 'timeout' | 'transport';

export interface ExecutionSuccess {
  status: 'success';
  stdout: string;
  stderr?: string;
  // data URI of the first image the code produced
  visualization?: string;
}

export interface ExecutionFailure {
  status: 'failure';
  errorKind: ExecutionErrorKind;
  error: string;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/**
 * One turn of the conversation. Instances are frozen on creation, so a
 * correction is always a new Message appended after this one.
 */
export class Message {
  readonly role: Role;
  readonly content: string;
  readonly executionResult?: Readonly<ExecutionResult>;
  readonly createdAt: number;

  private constructor(role: Role, content: string, executionResult?: ExecutionResult, createdAt = Date.now()) {
    this.role = role;
    this.content = content;
    if (executionResult) {
      this.executionResult = Object.freeze({ ...executionResult });
    }
    this.createdAt = createdAt;
    Object.freeze(this);
  }

  static human(content: string): Message {
    return new Message('human', content);
  }

  static assistant(content: string, executionResult?: ExecutionResult): Message {
    return new Message('assistant', content, executionResult);
  }
}
