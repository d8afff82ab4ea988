/**
 * Authorization Header Parsing
 *
 * @module auth/oauth/auth-header
 */

const ACCEPTED_SCHEMES = ["bearer", "token"];

/**
 * Extract the credential from Authorization header values
 *
 * Each value must be exactly `<scheme> <credential>` separated by a single
 * space, with scheme `Bearer` or `token` in any case. Values that do not fit
 * are skipped; the first one that does wins.
 *
 * @param values - Raw header values (Express `req.headersDistinct.authorization`)
 * @returns The credential, or false if no header carries one
 */
export function parseAuthorizationHeaders(
  values: readonly string[] | string | undefined
): string | false {
  if (values === undefined) {
    return false;
  }

  const headers = typeof values === "string" ? [values] : values;

  for (const header of headers) {
    const parts = header.split(" ");
    const scheme = parts[0];
    const credential = parts[1];
    if (parts.length !== 2 || !scheme || !credential) {
      continue;
    }
    if (ACCEPTED_SCHEMES.includes(scheme.toLowerCase())) {
      return credential;
    }
  }

  return false;
}
