import type net from "node:net";

export type ListenAddress = {
  host: string;
  port: number;
};

/**
 * Bind `server` and resolve with the bound address. Bind failures (port in
 * use, permission) reject.
 */
export async function listenServer(server: net.Server, port: number, host?: string): Promise<ListenAddress> {
  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("unexpected listener address");
  }
  return { host: address.address, port: address.port };
}
