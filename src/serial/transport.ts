import { EventEmitter } from "events";
import { ReadlineParser, SerialPort } from "serialport";

/**
 * Line-oriented byte channel to the microcontroller. The link only ever
 * talks to this interface; tests substitute an in-process device.
 */
export interface LineTransport {
  readonly path: string;
  open(): Promise<void>;
  write(data: string): Promise<void>;
  close(): Promise<void>;
  onLine(listener: (line: string) => void): void;
  onDisconnect(listener: (err?: Error) => void): void;
}

export type TransportFactory = (path: string, baudRate: number) => LineTransport;

export class SerialLineTransport implements LineTransport {
  readonly path: string;
  private port: SerialPort;
  private events = new EventEmitter();

  constructor(path: string, baudRate: number) {
    this.path = path;
    this.port = new SerialPort({ path, baudRate, autoOpen: false });

    const parser = this.port.pipe(new ReadlineParser({ delimiter: "\n" }));
    parser.on("data", (data: string) => this.events.emit("line", data.trim()));
    this.port.on("error", (err: Error) => this.events.emit("disconnect", err));
    this.port.on("close", () => this.events.emit("disconnect"));
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((err) => (err ? reject(err) : resolve()));
    });
  }

  write(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.write(data, "utf8", (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
      });
    });
  }

  close(): Promise<void> {
    if (!this.port.isOpen) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
  }

  onLine(listener: (line: string) => void) {
    this.events.on("line", listener);
  }

  onDisconnect(listener: (err?: Error) => void) {
    this.events.on("disconnect", listener);
  }
}

export const openSerialTransport: TransportFactory = (path, baudRate) =>
  new SerialLineTransport(path, baudRate);
