import portfinder from 'portfinder';

/**
 * True when nothing is listening on `port` on any local interface.
 */
export async function isPortAvailable(port: number): Promise<boolean> {
  try {
    const found = await portfinder.getPortPromise({ port, stopPort: port });
    return found === port;
  } catch {
    return false;
  }
}

/**
 * Find the next available port starting from basePort
 */
export async function getFreePort(basePort: number): Promise<number> {
  return portfinder.getPortPromise({ port: basePort });
}
