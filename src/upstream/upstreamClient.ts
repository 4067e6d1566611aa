// Axios is the HTTP client for calls to the upstream service, with timeouts.
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { UpstreamHealthSchema } from '../schemas/apiSchemas';
import type { UpstreamHealth } from '../schemas/apiSchemas';

// Thin wrapper around the upstream service's REST API.
export class UpstreamClient {
  private http: AxiosInstance;

  constructor(http: AxiosInstance) {
    this.http = http;
  }

  // Builds a client with a scoped base URL and timeout.
  static create(baseURL: string, timeoutMs: number): UpstreamClient {
    return new UpstreamClient(
      axios.create({
        baseURL: baseURL.replace(/\/$/, ''),
        headers: { Accept: 'application/json' },
        timeout: timeoutMs,
      })
    );
  }

  // Fetches the upstream health document; rejects on transport errors, non-2xx or an unexpected body.
  async ping(): Promise<UpstreamHealth> {
    const { data } = await this.http.get<unknown>('/health');
    return UpstreamHealthSchema.parse(data);
  }
}
