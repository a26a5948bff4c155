export type VectorStoreErrorCode =
  | 'collection_not_found'
  | 'collection_exists'
  | 'invalid_item'
  | 'invalid_argument'
  | 'dimension_mismatch'
  | 'invalid_config';

export class VectorStoreError extends Error {
  constructor(
    public readonly code: VectorStoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'VectorStoreError';
  }
}

export class CollectionNotFoundError extends VectorStoreError {
  constructor(public readonly collection: string) {
    super('collection_not_found', `Collection ${collection} does not exist`);
    this.name = 'CollectionNotFoundError';
  }
}

export class CollectionExistsError extends VectorStoreError {
  constructor(public readonly collection: string) {
    super('collection_exists', `Collection ${collection} already exists`);
    this.name = 'CollectionExistsError';
  }
}

export class InvalidItemError extends VectorStoreError {
  constructor(message: string, public readonly details: string[] = []) {
    super('invalid_item', details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'InvalidItemError';
  }
}

export class InvalidArgumentError extends VectorStoreError {
  constructor(message: string) {
    super('invalid_argument', message);
    this.name = 'InvalidArgumentError';
  }
}

export class DimensionMismatchError extends VectorStoreError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super('dimension_mismatch', `Embedding dimension ${actual} does not match collection dimensionality ${expected}`);
    this.name = 'DimensionMismatchError';
  }
}

export class VectorConfigError extends VectorStoreError {
  constructor(message: string, public readonly details: string[] = []) {
    super('invalid_config', details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'VectorConfigError';
  }
}
