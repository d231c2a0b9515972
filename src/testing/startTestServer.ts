import express, { Application } from "express";
import { Server } from "http";
import { AddressInfo } from "net";

export interface TestServer {
  app: Application;
  baseUrl: string;
  stop: () => Promise<void>;
}

/**
 * Express app bound to an ephemeral loopback port. Routes are added by the
 * caller through `app` before or after start.
 */
export async function startTestServer(
  configure: (app: Application) => void = () => undefined
): Promise<TestServer> {
  const app: Application = express();
  app.disable("x-powered-by");
  app.set("etag", false);
  configure(app);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    listening.on("error", reject);
  });

  const { port } = addressOf(server);

  return {
    app,
    baseUrl: `http://127.0.0.1:${port}`,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("test server is not listening on a TCP port");
  }
  return address;
}
