/**
 * Balances have no floor: postpaid users run into debt, prepaid users into
 * overdraft. Flip to false to reject drinks that would go below zero.
 */
export const POSTPAID_DEBT_ALLOWED: boolean = true;
export const PREPAID_OVERDRAFT_ALLOWED: boolean = true;

// attempts to find a user key that was never handed out
export const USER_KEY_MAX_ATTEMPTS = 5;

export const postpaidLockKey = (username: string) => `user:postpaid:${username}`;
export const prepaidLockKey = (username: string) => `user:prepaid:${username}`;
