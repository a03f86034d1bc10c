// node-osc 9 publishes no type definitions; this covers the part of its API used here.
declare module 'node-osc' {
  import { EventEmitter } from 'node:events';

  /** Plain values are typed by the encoder; `{ type, value }` pins the OSC type tag. */
  export type ArgumentType = number | string | boolean | Buffer | { type: string; value?: unknown };

  export class Message {
    constructor(address: string, ...args: ArgumentType[]);
    readonly address: string;
    readonly args: ArgumentType[];
    append(arg: ArgumentType | ArgumentType[]): void;
  }

  /** Emits `listening`, `message` ([address, ...args], rinfo), `bundle` and `error`. */
  export class Server extends EventEmitter {
    constructor(port: number, host?: string, callback?: () => void);
    close(callback?: () => void): void;
  }

  export class Client {
    constructor(host: string, port: number);
    send(message: Message, callback?: (error: Error | null) => void): void;
    close(callback?: () => void): void;
  }
}
