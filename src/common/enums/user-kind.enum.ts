export enum UserKind {
  POSTPAID = 'postpaid', // billed against a running balance
  PREPAID = 'prepaid', // pre-funded, owned by a postpaid user
}
