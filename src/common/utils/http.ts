import axios from 'axios';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

/**
 * Trace of one HTTP exchange, kept for channel logs.
 * `statusCode` is 0 when no response arrived.
 */
export interface RequestResponse {
  method: HttpMethod;
  url: string;
  statusCode: number;
  request: string;
  response: string;
  body: string;
  elapsedMs: number;
  error?: string;
}

function requestTarget(url: string): { target: string; host: string } {
  try {
    const parsed = new URL(url);
    return { target: `${parsed.pathname}${parsed.search}`, host: parsed.host };
  } catch {
    return { target: url, host: '' };
  }
}

export function dumpRequest(req: HttpRequest): string {
  const { target, host } = requestTarget(req.url);
  const lines = [`${req.method} ${target} HTTP/1.1`, `Host: ${host}`];
  for (const [name, value] of Object.entries(req.headers)) {
    lines.push(`${name}: ${value}`);
  }
  return `${lines.join('\r\n')}\r\n\r\n${req.body ?? ''}`;
}

function dumpResponse(statusCode: number, statusText: string, headers: object, body: string): string {
  const lines = [`HTTP/1.1 ${statusCode} ${statusText}`.trimEnd()];
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined && value !== null) {
      lines.push(`${name}: ${String(value)}`);
    }
  }
  return `${lines.join('\r\n')}\r\n\r\n${body}`;
}

/**
 * Makes the request with axios and returns a trace of it.
 * Never throws: transport failures and non-2xx responses end up in `error`.
 */
export async function makeHttpRequest(req: HttpRequest): Promise<RequestResponse> {
  const start = Date.now();
  const trace: RequestResponse = {
    method: req.method,
    url: req.url,
    statusCode: 0,
    request: dumpRequest(req),
    response: '',
    body: '',
    elapsedMs: 0,
  };

  try {
    const res = await axios.request<string>({
      method: req.method,
      url: req.url,
      headers: req.headers,
      data: req.body,
      timeout: req.timeoutMs,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    });

    const body = typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? '');
    trace.statusCode = res.status;
    trace.body = body;
    trace.response = dumpResponse(res.status, res.statusText, res.headers, body);

    if (res.status < 200 || res.status >= 300) {
      trace.error = `received non 200 status: ${res.status}`;
    }
  } catch (err) {
    trace.error = err instanceof Error ? err.message : String(err);
  }

  trace.elapsedMs = Date.now() - start;
  return trace;
}
