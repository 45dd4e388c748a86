import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

/**
 * Read and parse a JSON request body, refusing anything over `maxBytes` even
 * when Content-Length is missing or wrong. An empty body parses as `{}`.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const tooLarge = () => c.json({ status: 'error', message: `Request too large (max ${maxBytes} bytes)` }, 413);

  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: tooLarge() };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ status: 'error', message: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const stream = c.req.raw.body;
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;
  if (stream) {
    const reader = stream.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        totalBytes += value.byteLength;
        if (totalBytes > maxBytes) {
          await reader.cancel();
          return { ok: false, response: tooLarge() };
        }
        chunks.push(value);
      }
    } catch {
      return { ok: false, response: c.json({ status: 'error', message: 'Failed to read request body' }, 400) };
    }
  }

  const raw = Buffer.concat(chunks).toString('utf8');
  if (!raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ status: 'error', message: 'Request body is not valid JSON' }, 400) };
  }
}
