// JSON decoding that keeps large ledger integers exact

// String literals are matched whole so digits inside them are never touched;
// integer literals of 16+ digits outside them become decimal strings, since
// past 2^53 a JS number rounds.
const LARGE_INTEGER = /"(?:[^"\\]|\\.)*"|(?<![\d.eE+-])(-?\d{16,})(?![\d.eE])/g;

/**
 * JSON.parse, except integers too long for a double arrive as strings.
 * Schemas that read amounts accept `number | string` for this reason.
 */
export function parseJson(text: string): unknown {
  return JSON.parse(
    text.replace(LARGE_INTEGER, (token: string, digits: string | undefined) =>
      digits === undefined ? token : `"${digits}"`
    )
  );
}

const BIGINT_MARKER = /"@@bigint:(-?\d+)"/g;

/**
 * JSON.stringify that writes bigints as bare integer literals, for JSON-RPC
 * peers that read amounts as unbounded integers.
 */
export function stringifyJson(value: unknown): string {
  return JSON.stringify(value, (_key: string, field: unknown) =>
    typeof field === 'bigint' ? `@@bigint:${field}` : field
  ).replace(BIGINT_MARKER, '$1');
}
