import axios, { AxiosInstance } from "axios";
import { isRecord } from "../../utils/json";

/** Minimal remote key-value surface the session store needs. Every method may reject. */
export interface RemoteKv {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Atomic SET NX; true when this call created the key. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  del(key: string): Promise<void>;
}

type UpstashOptions = {
  url: string;
  token: string;
  timeoutMs: number;
  http?: AxiosInstance;
};

/** Redis over the Upstash REST API: each command is POSTed as a JSON array. */
export class UpstashKv implements RemoteKv {
  private readonly http: AxiosInstance;

  constructor(options: UpstashOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.url,
        timeout: options.timeoutMs,
        headers: {
          Authorization: `Bearer ${options.token}`,
          "Content-Type": "application/json"
        }
      });
  }

  private async command(args: string[]): Promise<unknown> {
    const response = await this.http.post<unknown>("/", args);
    const body = response.data;
    if (!isRecord(body)) {
      throw new Error(`unexpected Upstash response for ${args[0]}`);
    }
    if (typeof body.error === "string") {
      throw new Error(`Upstash ${args[0]} error: ${body.error}`);
    }
    return body.result ?? null;
  }

  async get(key: string): Promise<string | null> {
    const result = await this.command(["GET", key]);
    return typeof result === "string" ? result : null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.command(["SET", key, value, "EX", String(ttlSeconds)]);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.command(["SET", key, value, "NX", "EX", String(ttlSeconds)]);
    return result === "OK";
  }

  async del(key: string): Promise<void> {
    await this.command(["DEL", key]);
  }
}
