// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class ValidationError extends DomainError {
     constructor(
          message: string,
          public readonly issues: string[] = []
     ) {
          super(message, 'VALIDATION_ERROR', 400);
     }
}

export class NegativeQuantityError extends ValidationError {
     constructor(
          public readonly productCode: string,
          public readonly lotId: string,
          public readonly location: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Quantity for ${productCode}/${lotId} at ${location} would go negative: delta ${requested}, available ${available}`
          );
     }
}

export class LotNotFoundError extends DomainError {
     constructor(
          public readonly productCode: string,
          public readonly lotId: string
     ) {
          super(`Lot ${lotId} of product ${productCode} not found`, 'LOT_NOT_FOUND', 404);
     }
}

export class RepositoryError extends DomainError {
     public readonly retriable: boolean;

     constructor(
          message: string,
          options: { cause?: unknown; retriable?: boolean } = {}
     ) {
          super(message, 'REPOSITORY_ERROR', 503);
          this.retriable = options.retriable ?? true;
          if (options.cause !== undefined) {
               this.cause = options.cause;
          }
     }
}

export class SalesApiError extends RepositoryError {
     constructor(
          public readonly upstreamStatus: number,
          message: string
     ) {
          // 429, 503, 504 are retriable
          super(message, { retriable: [429, 503, 504].includes(upstreamStatus) });
     }
}

export class DataIntegrityError extends DomainError {
     constructor(
          message: string,
          public readonly jobName: string,
          public readonly productCode?: string,
          public readonly lotId?: string
     ) {
          super(message, 'DATA_INTEGRITY', 409);
     }
}

export class ConfigMissingError extends DomainError {
     constructor(
          public readonly reason: string,
          public readonly category: string
     ) {
          super(`No decision rule for reason ${reason} in category ${category}`, 'CONFIG_MISSING', 404);
     }
}

export function describeError(error: unknown): string {
     return error instanceof Error ? error.message : 'Unknown error';
}

/** Runs `fn`, passing domain errors through and wrapping anything else in a RepositoryError. */
export async function guardRepository<T>(action: string, fn: () => Promise<T>): Promise<T> {
     try {
          return await fn();
     } catch (error) {
          if (error instanceof DomainError) {
               throw error;
          }
          throw new RepositoryError(`Failed to ${action}: ${describeError(error)}`, { cause: error });
     }
}
