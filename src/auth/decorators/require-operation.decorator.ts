import { SetMetadata } from '@nestjs/common';
import { LedgerOperation } from '../../common/enums/ledger-operation.enum';

export const LEDGER_OPERATION_KEY = 'ledgerOperation';

/**
 * Marks a handler with the operation LedgerPolicyGuard checks
 */
export const RequireOperation = (operation: LedgerOperation) =>
  SetMetadata(LEDGER_OPERATION_KEY, operation);
