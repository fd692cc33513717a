import type { Readable, Writable } from 'node:stream';

import type { TransportError } from '../protocol/errors.js';
import type { RequestMultiplexer } from '../rpc/multiplexer.js';
import { StreamTransport } from '../transport/stream-transport.js';
import type { ProtocolGateway } from './gateway.js';

export interface StdioServerHandle {
  transport: StreamTransport;
  rpc: RequestMultiplexer;
  /** Settles when the client closes its end of the pipe. */
  closed: Promise<TransportError>;
  stop(): Promise<void>;
}

/**
 * Serves one client over newline-delimited JSON, answering requests one at
 * a time in arrival order. The host's stdout is never ended.
 */
export async function serveStdio(
  gateway: ProtocolGateway,
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Promise<StdioServerHandle> {
  const transport = new StreamTransport(input, output, {
    framing: 'newline',
    label: 'stdio',
    endOutputOnStop: output !== process.stdout,
  });
  const rpc = gateway.attach(transport, { inbound: 'sequential' });
  const closed = new Promise<TransportError>((resolve) => {
    transport.onClose(resolve);
  });
  await transport.start();

  return {
    transport,
    rpc,
    closed,
    stop: async () => {
      await rpc.drain();
      await transport.stop();
    },
  };
}
