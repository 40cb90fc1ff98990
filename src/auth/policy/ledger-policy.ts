import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LedgerOperation } from '../../common/enums/ledger-operation.enum';
import { Principal } from '../interfaces/principal.interface';

export type AccessLevel = 'authenticated' | 'member' | 'admin';

export type PolicyDecision = 'allow' | 'unauthorized' | 'forbidden';

export interface GroupPolicy {
  memberGroup: string;
  adminGroup: string;
}

export const OPERATION_ACCESS: Readonly<Record<LedgerOperation, AccessLevel>> = {
  [LedgerOperation.RECORD_DRINK]: 'authenticated',
  [LedgerOperation.VIEW_OWN_PREPAID]: 'member',
  [LedgerOperation.ADD_PREPAID_USER]: 'member',
  [LedgerOperation.ADD_MONEY_PREPAID]: 'member',
  [LedgerOperation.VIEW_LEDGER]: 'admin',
  [LedgerOperation.TOGGLE_ACTIVATED]: 'admin',
  [LedgerOperation.SET_MONEY]: 'admin',
  [LedgerOperation.PAYUP]: 'admin',
  [LedgerOperation.DELETE_PREPAID_USER]: 'admin',
};

export const groupPolicyFromConfig = (configService: ConfigService): GroupPolicy => ({
  memberGroup: configService.get<string>('auth.memberGroup', 'drinks'),
  adminGroup: configService.get<string>('auth.adminGroup', 'drinks-admin'),
});

export const isAdmin = (principal: Principal, policy: GroupPolicy): boolean =>
  principal.groups.includes(policy.adminGroup);

// admin включает права участника
export const isMember = (principal: Principal, policy: GroupPolicy): boolean =>
  isAdmin(principal, policy) || principal.groups.includes(policy.memberGroup);

/**
 * Pure group check, no store access.
 * Ownership and activation are checked by LedgerService on top of this.
 */
export function evaluate(
  principal: Principal | null | undefined,
  operation: LedgerOperation,
  policy: GroupPolicy,
): PolicyDecision {
  if (!principal) {
    return 'unauthorized';
  }

  switch (OPERATION_ACCESS[operation]) {
    case 'authenticated':
      return 'allow';
    case 'member':
      return isMember(principal, policy) ? 'allow' : 'forbidden';
    case 'admin':
      return isAdmin(principal, policy) ? 'allow' : 'forbidden';
  }
}

/**
 * Throws UnauthorizedException or ForbiddenException unless `evaluate` allows.
 * Narrows the principal for the caller.
 */
export function assertAllowed(
  principal: Principal | null | undefined,
  operation: LedgerOperation,
  policy: GroupPolicy,
): asserts principal is Principal {
  const decision = evaluate(principal, operation, policy);
  if (decision === 'unauthorized') {
    throw new UnauthorizedException('Authentication required');
  }
  if (decision === 'forbidden') {
    throw new ForbiddenException(`Not allowed to perform ${operation}`);
  }
}
