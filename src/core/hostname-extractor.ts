export const HOSTNAME_MARKER = 'VIOS hostname:';

/**
 * Returns the line following the first `VIOS hostname:` marker, trimmed.
 * Only the first marker counts: when the line after it is blank or missing
 * the host is unnamed even if another marker appears later.
 */
export function extractHostname(lines: readonly string[]): string | null {
  const markerIndex = lines.findIndex(line => line.trim() === HOSTNAME_MARKER);
  if (markerIndex === -1) return null;

  const hostname = lines[markerIndex + 1]?.trim() ?? '';
  return hostname === '' ? null : hostname;
}
