/**
 * Host environment handed to shell.run children, minus anything that looks like a
 * credential.
 */

const SENSITIVE_ENV_PATTERNS: readonly RegExp[] = [
  /^.*_(API_KEY|SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE_KEY)(_.*)?$/i,
  /^(API_KEY|AUTH_TOKEN|SECRET_KEY|PRIVATE_KEY|PASSWORD|CREDENTIALS?)(_.*)?$/i,
  /^(AWS_SECRET|GITHUB_TOKEN|NPM_TOKEN|SSH_KEY|PGP_PASSPHRASE)(_.*)?$/i,
  /^.*_AUTH_(TOKEN|KEY|SECRET)(_.*)?$/i,
  /^(COOKIE|SESSION_ID|SESSION_SECRET)(_.*)?$/i,
];

export function isSensitiveEnvKey(key: string): boolean {
  return SENSITIVE_ENV_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Build a child process environment: the host variables that are not sensitive, then the
 * step's own entries, which are passed through as given.
 */
export function childProcessEnv(
  host: NodeJS.ProcessEnv,
  extra: Record<string, string> = {}
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(host)) {
    if (value !== undefined && !isSensitiveEnvKey(key)) {
      env[key] = value;
    }
  }
  return { ...env, ...extra };
}
