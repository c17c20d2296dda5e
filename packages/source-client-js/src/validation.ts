import { UsageError, ValidationError } from './errors';
import type { Validatable } from './types';

/**
 * Throw a UsageError when a required string argument is empty.
 */
export function requireArgument(value: string | undefined, argument: string, message?: string): string {
  if (!value) {
    throw new UsageError(message ?? `${argument} is required`, { argument });
  }
  return value;
}

function isThenable(value: object): boolean {
  return typeof Reflect.get(value, 'then') === 'function';
}

/**
 * Check an item before it is serialized for `save()`.
 *
 * The item must be a value the request can own outright, and its own
 * `validate()` must pass. A ValidationError thrown by `validate()` reaches the
 * caller unchanged; anything else it throws is wrapped in one.
 *
 * @throws {UsageError} If the item is a promise, a function or not an object
 * @throws {ValidationError} If the item rejects itself
 */
export function checkItem(item: Validatable): void {
  if (typeof item !== 'object' || item === null) {
    throw new UsageError('item passed to save() must be an object value', { argument: 'item' });
  }
  if (isThenable(item)) {
    throw new UsageError('item passed to save() must be a value, not a promise', { argument: 'item' });
  }
  if (typeof item.validate !== 'function') {
    throw new UsageError('item passed to save() must implement validate()', { argument: 'item' });
  }
  try {
    item.validate();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`item failed validation: ${reason}`, { cause: error });
  }
}
