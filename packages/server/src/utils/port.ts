import { createServer } from 'net';

export async function findAvailablePort(startPort: number, host = '127.0.0.1', maxAttempts = 20): Promise<number> {
  for (let port = startPort; port < startPort + maxAttempts && port <= 65535; port++) {
    if (await isPortAvailable(port, host)) {
      return port;
    }
  }
  throw new Error(`No available port found between ${startPort} and ${startPort + maxAttempts - 1}`);
}

export function isPortAvailable(port: number, host = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();

    server.once('error', () => {
      resolve(false);
    });

    server.once('listening', () => {
      server.close(() => resolve(true));
    });

    server.listen(port, host);
  });
}
