/**
 * Store-native write outcomes
 * One class per operation; they share a shape and differ only in type identity
 */

/**
 * Not every store exposes every detail on its errors, so each accessor is optional
 * and may also return undefined.
 */
export interface RawWriteError {
  getFields?(): readonly string[] | undefined;
  getMessage?(): string | undefined;
  getStatusCode?(): string | undefined;
}

export interface RawOutcome {
  isSuccess(): boolean;
  getId(): string | undefined;
  getErrors(): readonly RawWriteError[];
}

export interface StoreWriteErrorData {
  fields?: readonly string[];
  message?: string;
  statusCode?: string;
}

export class StoreWriteError implements RawWriteError {
  private readonly fields?: readonly string[];
  private readonly message?: string;
  private readonly statusCode?: string;

  constructor(data: StoreWriteErrorData) {
    this.fields = data.fields;
    this.message = data.message;
    this.statusCode = data.statusCode;
  }

  public getFields(): readonly string[] | undefined {
    return this.fields;
  }

  public getMessage(): string | undefined {
    return this.message;
  }

  public getStatusCode(): string | undefined {
    return this.statusCode;
  }
}

export interface OutcomeData {
  success: boolean;
  id?: string;
  errors?: readonly RawWriteError[];
}

abstract class BaseOutcome implements RawOutcome {
  protected readonly success: boolean;
  protected readonly id?: string;
  protected readonly errors: readonly RawWriteError[];

  constructor(data: OutcomeData) {
    this.success = data.success;
    this.id = data.id;
    this.errors = data.errors ?? [];
  }

  public isSuccess(): boolean {
    return this.success;
  }

  public getId(): string | undefined {
    return this.id;
  }

  public getErrors(): readonly RawWriteError[] {
    return this.errors;
  }
}

/**
 * Outcome of an insert or update
 */
export class SaveOutcome extends BaseOutcome {}

export class DeleteOutcome extends BaseOutcome {}

export class UpsertOutcome extends BaseOutcome {
  private readonly created: boolean;

  constructor(data: OutcomeData & { created?: boolean }) {
    super(data);
    this.created = data.created ?? false;
  }

  /**
   * Whether the upsert inserted a new record rather than updating one
   */
  public isCreated(): boolean {
    return this.created;
  }
}
