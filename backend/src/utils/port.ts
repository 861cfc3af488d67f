import net from "node:net";

function isPortFree(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = net.createServer();
    probe.once("error", () => resolve(false));
    probe.once("listening", () => {
      probe.close(() => resolve(true));
    });
    probe.listen(port, host);
  });
}

export async function findAvailablePort(
  startPort = 8100,
  endPort = 9000,
  host = "127.0.0.1"
): Promise<number> {
  for (let port = startPort; port < endPort; port += 1) {
    if (await isPortFree(port, host)) return port;
  }
  throw new Error(`No available ports found in range ${startPort}-${endPort}`);
}
