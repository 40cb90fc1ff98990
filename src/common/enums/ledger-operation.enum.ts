/**
 * Operation classes gated by the authorization policy
 */
export enum LedgerOperation {
  VIEW_OWN_PREPAID = 'VIEW_OWN_PREPAID', // list own prepaid users
  ADD_PREPAID_USER = 'ADD_PREPAID_USER',
  ADD_MONEY_PREPAID = 'ADD_MONEY_PREPAID', // top up an owned prepaid user
  RECORD_DRINK = 'RECORD_DRINK',
  VIEW_LEDGER = 'VIEW_LEDGER', // full postpaid/prepaid ledgers
  TOGGLE_ACTIVATED = 'TOGGLE_ACTIVATED',
  SET_MONEY = 'SET_MONEY',
  PAYUP = 'PAYUP',
  DELETE_PREPAID_USER = 'DELETE_PREPAID_USER',
}
