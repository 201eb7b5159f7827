/**
 * Contract of the user-management collaborator consulted for revocation
 */

/** The subset of a user record the revocation check reads */
export interface UserRecord {
  uid: string;
  disabled: boolean;
  /** Tokens issued before this instant (epoch ms) are revoked */
  tokensValidAfterMillis: number;
}

/** Looks up user records; rejects with a USER_NOT_FOUND AuthError when absent */
export interface UserRecordProvider {
  getUser(uid: string, signal?: AbortSignal): Promise<UserRecord>;
}
