export type ApiKeyStatus = 'valid' | 'invalid';

/**
 * Persisted credentials record (credentials.json)
 */
export interface UserRecord {
  username: string;
  email: string | null;
  full_name: string;
  hashed_password: string;
  external_api_key: string;
  api_key_status: ApiKeyStatus;
  api_key_checked_at: string;
  disabled: boolean;
  created_at: string;
  last_login: string | null;
}

/**
 * What the API exposes about a user
 */
export type UserProfile = Omit<UserRecord, 'hashed_password' | 'external_api_key'>;

export interface NewUser {
  username: string;
  password: string;
  apiKey: string;
  email?: string;
}

export interface LoginResult {
  user: UserRecord;
  accessToken: string;
  apiKeyStatus: ApiKeyStatus;
  /** true when the service was unreachable and apiKeyStatus is the last recorded verdict */
  apiKeyStale: boolean;
  apiKeyUpdated: boolean;
}

export function toUserProfile(user: UserRecord): UserProfile {
  const { hashed_password: _hash, external_api_key: _key, ...profile } = user;
  return profile;
}
