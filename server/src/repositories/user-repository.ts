export interface UserRecord {
  readonly id: string;
  readonly accountId: string;
  readonly email: string | null;
  readonly name: string | null;
  readonly createdAt: Date;
  readonly lastLoginAt: Date | null;
}

/** What a validated provider credential tells us about its owner. */
export interface CredentialIdentity {
  readonly accountId: string;
  readonly email?: string | null;
  readonly name?: string | null;
}

export interface UserRepository {
  /** Returns the existing row when `accountId` is already known. */
  createUser(identity: CredentialIdentity): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  recordLogin(id: string, at: Date): Promise<void>;
  /** Administrative; cascades to the user's conversations. */
  deleteUser(id: string): Promise<boolean>;
}
