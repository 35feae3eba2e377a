import axios, { type AxiosInstance } from "axios";
import { DownloadError } from "../utils/errors";

export interface DownloadResult {
  data: Buffer;
  size: number;
  elapsedMs: number;
}

export interface Downloader {
  fetch(url: URL): Promise<DownloadResult>;
}

/**
 * Fetches a whole artifact into memory with a single GET. There is no retry;
 * any transport error or non-2xx status surfaces as a DownloadError.
 */
export class DownloadService implements Downloader {
  private readonly http: AxiosInstance;

  constructor(options: { timeoutMs?: number; http?: AxiosInstance } = {}) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 0,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      });
  }

  async fetch(url: URL): Promise<DownloadResult> {
    const started = Date.now();

    try {
      const response = await this.http.get<ArrayBuffer>(url.toString(), {
        responseType: "arraybuffer",
      });
      const data = Buffer.from(response.data);

      return {
        data,
        size: data.length,
        elapsedMs: Date.now() - started,
      };
    } catch (error) {
      throw new DownloadError(url.toString(), error);
    }
  }
}
