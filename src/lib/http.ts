import { SessionMode } from './types.js';

// per-call mode asks the server to drop the socket once the response is read
export function sessionHeaders(mode: SessionMode): Record<string, string> {
  return mode === 'per-call' ? { Connection: 'close' } : {};
}

// best effort body read for error logs, never throws
export async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    return `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`;
  }
}

// let go of a body we do not need so a kept-alive socket can be reused
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}
