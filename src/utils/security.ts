// Supported protocol versions - the configured one plus earlier revisions
// that clients may still send
const PREVIOUS_PROTOCOL_VERSIONS = ['2025-03-26', '2024-11-05'];

export const validateProtocolVersion = (headers: Headers, expected: string): void => {
  const header =
    headers.get('Mcp-Protocol-Version') || headers.get('MCP-Protocol-Version');
  if (!header) return;
  const supported = [expected, ...PREVIOUS_PROTOCOL_VERSIONS];
  const versions = header
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  if (!versions.some((v) => supported.includes(v))) {
    throw new Error(
      `Unsupported MCP protocol version: ${header}. Supported: ${supported.join(', ')}`,
    );
  }
};

export const validateOrigin = (headers: Headers): void => {
  const origin = headers.get('Origin') || headers.get('origin');

  if (!origin) return; // non-browser callers

  if (!isLocalhostOrigin(origin)) {
    throw new Error(`Invalid origin: ${origin}. Only localhost origins are allowed`);
  }
};

export const isLocalhostOrigin = (origin: string): boolean => {
  try {
    const url = new URL(origin);
    const hostname = url.hostname.toLowerCase();
    return (
      hostname === 'localhost' ||
      hostname === '127.0.0.1' ||
      hostname === '[::1]' ||
      hostname.endsWith('.localhost')
    );
  } catch {
    return false;
  }
};
