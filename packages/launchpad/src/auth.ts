export interface Credentials {
  username: string;
  /** OAuth consumer key; defaults to the username. */
  consumerKey?: string;
  token: string;
  secret: string;
}

/** Identity attached to every outbound Launchpad request. */
export interface AuthContext {
  readonly username: string;
  readonly authorization: string;
}

/**
 * Format an OAuth 1.0 PLAINTEXT Authorization header. With PLAINTEXT the
 * signature is the consumer secret (empty for Launchpad) and the token
 * secret joined by "&".
 */
export function plaintextAuthorization(
  consumerKey: string,
  token: string,
  secret: string,
): string {
  return [
    `OAuth oauth_version="1.0"`,
    `oauth_signature_method="PLAINTEXT"`,
    `oauth_consumer_key="${consumerKey}"`,
    `oauth_token="${token}"`,
    `oauth_signature="&${secret}"`,
  ].join(", ");
}

export function createAuthContext(credentials: Credentials): AuthContext {
  return {
    username: credentials.username,
    authorization: plaintextAuthorization(
      credentials.consumerKey ?? credentials.username,
      credentials.token,
      credentials.secret,
    ),
  };
}
