import http from "http";
import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from "axios";
import { Express } from "express";

type StubReply = { status?: number; data: unknown };

/**
 * An axios instance whose requests never leave the process: every request is
 * answered by `handler`. Replies with a status >= 400 are rejected the way the
 * real adapter rejects them.
 */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = await handler(config);
      const status = reply.status ?? 200;
      const response = { data: reply.data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    }
  });
  return { http: instance, requests };
}

export async function startServer(app: Express): Promise<{ baseUrl: string; close: () => Promise<void> }> {
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
