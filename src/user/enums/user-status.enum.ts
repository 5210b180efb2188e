// pending -> active | rejected; both targets are terminal.
export enum UserStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  REJECTED = 'rejected',
}
