/**
 * Stable file names for per-company artifacts.
 */

/** Keep letters, digits, space, `-` and `_`; then spaces become `-`. */
export function sanitizeCompanyName(name: string): string {
  return name.replace(/[^A-Za-z0-9 _-]/g, '').replace(/ /g, '-');
}

/** Relative path of the raw search document, e.g. `info/info-Acme-Corp.json`. */
export function searchArtifactPath(companyName: string): string {
  return `info/info-${sanitizeCompanyName(companyName)}.json`;
}
