export class SonosApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Sonos API error: ${status}`);
    this.name = 'SonosApiError';
  }
}

/**
 * Thin transport over node-sonos-http-api. Non-2xx answers are thrown as
 * SonosApiError; fetch failures are thrown unchanged.
 */
export class SonosClient {
  constructor(
    private baseUrl: string,
    private timeoutMs?: number
  ) {}

  async checkConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/zones`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async request(path: string): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, this.init('GET'));
    if (!response.ok) {
      throw new SonosApiError(response.status, await response.text());
    }
    return response.json();
  }

  async send(path: string): Promise<void> {
    const response = await fetch(`${this.baseUrl}${path}`, this.init('POST'));
    if (!response.ok) {
      throw new SonosApiError(response.status, await response.text());
    }
  }

  private init(method: 'GET' | 'POST'): RequestInit {
    if (this.timeoutMs === undefined) {
      return { method };
    }
    return { method, signal: AbortSignal.timeout(this.timeoutMs) };
  }
}
