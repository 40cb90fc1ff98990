import {
  ForbiddenException,
  ServiceUnavailableException,
} from '@nestjs/common';

/**
 * Thrown when a deactivated user tries to buy a drink.
 * Rendered as 403 with `error: "Inactive"` so clients can tell it apart
 * from a missing group membership.
 */
export class InactiveUserException extends ForbiddenException {
  constructor(username: string) {
    super(`User ${username} is not activated`, 'Inactive');
  }
}

/**
 * Persistence is unreachable. Fatal for the request, never retried here.
 */
export class StoreUnavailableException extends ServiceUnavailableException {
  constructor(message = 'Ledger store is unavailable', cause?: unknown) {
    super(message, { cause, description: 'StoreUnavailable' });
  }
}
