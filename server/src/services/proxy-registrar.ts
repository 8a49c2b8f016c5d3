/**
 * Proxy Registrar
 * Tells an external reverse proxy about session routes. Optional: without a
 * registrar URL every call is a no-op, and failures are only logged.
 */

export interface ProxyRoute {
  routePath: string;
  targetHost: string;
  targetPort: number;
}

export interface ProxyRegistrarOptions {
  /** Base URL of the registrar, e.g. http://127.0.0.1:8001/api/routes */
  url?: string;
  timeoutMs: number;
}

export class ProxyRegistrar {
  private readonly url: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: Partial<ProxyRegistrarOptions> = {}) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  get enabled(): boolean {
    return this.url !== undefined;
  }

  async register(route: ProxyRoute): Promise<boolean> {
    if (!this.url) return false;
    return this.send('POST', this.url, JSON.stringify(route), `register ${route.routePath}`);
  }

  async unregister(routePath: string): Promise<boolean> {
    if (!this.url) return false;
    const target = `${this.url}?routePath=${encodeURIComponent(routePath)}`;
    return this.send('DELETE', target, undefined, `unregister ${routePath}`);
  }

  private async send(method: 'POST' | 'DELETE', url: string, body: string | undefined, action: string): Promise<boolean> {
    try {
      const response = await fetch(url, {
        method,
        headers: body ? { 'Content-Type': 'application/json' } : undefined,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        console.warn(`[ProxyRegistrar] Failed to ${action}: HTTP ${response.status}`);
        return false;
      }
      console.log(`[ProxyRegistrar] ${action}: ok`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[ProxyRegistrar] Failed to ${action}: ${message}`);
      return false;
    }
  }
}
