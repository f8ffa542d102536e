/**
 * FluentbitTransport
 *
 * winston transport that ships every entry to a remote Fluent Bit collector as a
 * newline-terminated JSON document over a single TCP connection.
 *
 * The connection is opened lazily on the first entry. When the socket fails or
 * closes it is dropped and the next entry dials again; failures surface as
 * transport 'error' events, which the engine reports. Entries are never retried.
 */

import net from 'node:net';
import type { Writable } from 'node:stream';
import Transport from 'winston-transport';
import type { Formatter } from '../formatters/formatter.interface';
import { JSONFormatter } from '../formatters/json.formatter';
import { entryOf } from './entry-info';

export interface CollectorEndpoint {
  host: string;
  port: number;
}

export type SocketFactory = (endpoint: CollectorEndpoint) => Writable;

export const connectTcp: SocketFactory = ({ host, port }) => net.createConnection({ host, port });

export interface FluentbitTransportOptions extends Transport.TransportStreamOptions {
  endpoint: CollectorEndpoint;
  connect?: SocketFactory;
  encoder?: Formatter;
}

export class FluentbitTransport extends Transport {
  readonly endpoint: CollectorEndpoint;

  private readonly connect: SocketFactory;
  private readonly encoder: Formatter;
  private socket: Writable | undefined;

  constructor({ endpoint, connect, encoder, ...options }: FluentbitTransportOptions) {
    super(options);
    this.endpoint = endpoint;
    this.connect = connect ?? connectTcp;
    this.encoder = encoder ?? new JSONFormatter();
  }

  log(info: object, next: () => void): void {
    setImmediate(() => this.emit('logged', info));

    const entry = entryOf(info);
    if (entry) {
      try {
        const payload = `${this.encoder.format(entry)}\n`;
        this.dial().write(payload);
      } catch (error) {
        this.emit('error', error instanceof Error ? error : new Error(String(error)));
      }
    }

    next();
  }

  close(): void {
    const socket = this.socket;
    this.socket = undefined;
    socket?.end();
  }

  get connected(): boolean {
    return this.socket !== undefined;
  }

  private dial(): Writable {
    if (this.socket) {
      return this.socket;
    }

    const socket = this.connect(this.endpoint);
    const release = () => {
      if (this.socket === socket) {
        this.socket = undefined;
      }
    };

    socket.on('error', (error: Error) => {
      release();
      socket.destroy();
      this.emit('error', error);
    });
    socket.on('close', release);

    this.socket = socket;
    return socket;
  }
}
