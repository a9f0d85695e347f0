import * as si from 'systeminformation';
import type { Logger } from 'pino';

export const LOOPBACK = '127.0.0.1';

interface InterfaceInfo {
  iface: string;
  ip4: string;
  internal: boolean;
}

// the slice of systeminformation used here
export interface InterfaceSource {
  networkInterfaceDefault(): Promise<string>;
  networkInterfaces(): Promise<InterfaceInfo[] | InterfaceInfo>;
}

// ipv4 of the default interface, loopback when that cannot be worked out
export async function detectLocalAddress(logger: Logger, source: InterfaceSource = si): Promise<string> {
  try {
    const [defaultIface, interfaces] = await Promise.all([
      source.networkInterfaceDefault(),
      source.networkInterfaces()
    ]);
    const list = Array.isArray(interfaces) ? interfaces : [interfaces];

    const match = list.find(i => i.iface === defaultIface && i.ip4)
      ?? list.find(i => !i.internal && i.ip4);

    if (match) {
      logger.debug({ iface: match.iface, address: match.ip4 }, 'detected local address');
      return match.ip4;
    }
  } catch (err) {
    logger.warn({ err }, 'could not detect local address');
  }

  return LOOPBACK;
}
