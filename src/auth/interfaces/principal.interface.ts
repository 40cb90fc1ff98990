import { UserKind } from '../../common/enums/user-kind.enum';

/**
 * Authenticated identity attached to the request by JwtStrategy.
 * Groups come from the identity provider and are never persisted.
 */
export interface Principal {
  username: string;
  groups: string[];
  kind: UserKind;
}

/**
 * Claims accepted in a bearer token.
 * Member tokens come from the identity provider, prepaid tokens from POST /auth/prepaid.
 */
export interface JwtPayload {
  sub: string;
  preferred_username?: string;
  groups?: string[];
  kind?: UserKind;
}

export const isPrincipal = (value: unknown): value is Principal => {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('username' in value) ||
    !('groups' in value) ||
    !('kind' in value)
  ) {
    return false;
  }
  const { username, groups, kind } = value;
  return (
    typeof username === 'string' &&
    Array.isArray(groups) &&
    groups.every((group) => typeof group === 'string') &&
    (kind === UserKind.POSTPAID || kind === UserKind.PREPAID)
  );
};
