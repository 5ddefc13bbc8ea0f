const DEFAULT_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  "Accept-Language": "en-US,en;q=0.5",
};

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    body: string
  ) {
    super(`HTTP ${status} from ${url}${body ? ` - ${body.slice(0, 200)}` : ""}`);
    this.name = "HttpStatusError";
  }
}

export interface RequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

// Every request carries a timeout so a hung source cannot stall a scheduled job
async function request(url: string, accept: string, options: RequestOptions): Promise<Response> {
  const res = await fetch(url, {
    headers: { ...DEFAULT_HEADERS, Accept: accept, ...options.headers },
    signal: AbortSignal.timeout(options.timeoutMs),
  });

  if (!res.ok) {
    const body = await res.text();
    throw new HttpStatusError(res.status, url, body);
  }

  return res;
}

export async function getJson(url: string, options: RequestOptions): Promise<unknown> {
  const res = await request(url, "application/json", options);
  const body: unknown = await res.json();
  return body;
}

export async function getHtml(url: string, options: RequestOptions): Promise<string> {
  const res = await request(url, "text/html,application/xhtml+xml", options);
  return res.text();
}
