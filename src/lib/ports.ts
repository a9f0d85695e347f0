const MAX_RANGE = 1024;

export function parsePort(token: string): number {
  const trimmed = token.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`invalid port: ${token}`);
  }
  const port = parseInt(trimmed, 10);
  if (port < 1 || port > 65535) {
    throw new Error(`invalid port: ${token}`);
  }
  return port;
}

// "14000, 14001,14002" -> [14000, 14001, 14002], duplicates dropped
export function parsePortList(input: string): number[] {
  const ports = input
    .split(',')
    .filter(t => t.trim() !== '')
    .map(parsePort);
  if (ports.length === 0) {
    throw new Error(`no ports given in "${input}"`);
  }
  return [...new Set(ports)];
}

export function expandPortRange(start: number, end: number): number[] {
  if (end < start) {
    throw new Error(`invalid port range: ${start}-${end}`);
  }
  if (end - start + 1 > MAX_RANGE) {
    throw new Error(`port range ${start}-${end} is larger than ${MAX_RANGE} ports`);
  }
  const ports: number[] = [];
  for (let port = start; port <= end; port++) {
    ports.push(port);
  }
  return ports;
}

// "14000-14005", inclusive
export function parsePortRange(input: string): number[] {
  const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(input);
  if (!match) {
    throw new Error(`invalid port range: ${input}`);
  }
  return expandPortRange(parsePort(match[1]), parsePort(match[2]));
}
