/**
 * Environment variable helpers.
 *
 * Values sometimes arrive with embedded quotes (CI secrets, some .env parsers),
 * which breaks cookies and tokens, so they are stripped here.
 */

/**
 * Read a value from process.env, stripping any surrounding quotes and whitespace.
 * Returns undefined if the variable is not set or empty after cleaning.
 */
export function getEnvValue(envVar: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const raw = env[envVar];
  if (!raw) return undefined;

  const cleaned = raw.replace(/^["'\s]+|["'\s]+$/g, '');
  return cleaned || undefined;
}
