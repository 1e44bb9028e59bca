export type IndexErrorCode = 'NOT_FOUND';

/**
 * Base class for errors reported by the index
 */
export class IndexError extends Error {
  readonly code: IndexErrorCode;

  constructor(code: IndexErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class VectorNotFoundError extends IndexError {
  readonly id: string;

  constructor(id: string) {
    super('NOT_FOUND', `vector with id ${id} not found`);
    this.id = id;
  }
}
