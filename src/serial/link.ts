import { Logger } from "../utils/logger";
import { sleep } from "../utils/sleep";
import {
  ACTUATOR_NAMES,
  ActuatorName,
  ActuatorTable,
  resolveActuator,
} from "../motion/actuators";
import { ConnectResult, LinkState, SendResult } from "../types";
import { LineTransport, TransportFactory, openSerialTransport } from "./transport";
import { Mutex } from "./mutex";

export const READY_TOKEN = "READY";
export const ACK_PREFIX = "OK";

export type LinkOptions = {
  port: string;
  baudRate: number;
  handshakeTimeoutMs: number;
  ackTimeoutMs: number;
  commandDelayMs: number;
  angleMin: number;
  angleMax: number;
  actuators: ActuatorTable;
};

/**
 * Exclusive view of the link handed to code running under `withLock`.
 * Calls made through it do not take the lock again.
 */
export interface CommandChannel {
  send(actuator: string, angle: number): Promise<SendResult>;
  isReady(): boolean;
  positionOf(actuator: ActuatorName): number;
  restOf(actuator: ActuatorName): number;
  inRange(angle: number): boolean;
}

type Waiter = {
  match: (line: string) => boolean;
  resolve: (line: string | null) => void;
  timer: NodeJS.Timeout;
};

export class ActuatorLink {
  private options: LinkOptions;
  private logger: Logger;
  private createTransport: TransportFactory;
  private transport: LineTransport | null = null;
  private state: LinkState = "disconnected";
  private waiters: Waiter[] = [];
  private commanded = new Map<ActuatorName, number>();
  private mutex = new Mutex();
  private connecting: Promise<ConnectResult> | null = null;
  private channel: CommandChannel;

  constructor(options: LinkOptions, logger: Logger, createTransport: TransportFactory = openSerialTransport) {
    this.options = options;
    this.logger = logger;
    this.createTransport = createTransport;
    this.channel = {
      send: (actuator, angle) => this.transmit(actuator, angle),
      isReady: () => this.isReady(),
      positionOf: (actuator) => this.positionOf(actuator),
      restOf: (actuator) => this.options.actuators[actuator].rest,
      inRange: (angle) => this.inRange(angle),
    };
  }

  /** Overlapping callers share one attempt. */
  connect(): Promise<ConnectResult> {
    if (this.state === "ready") return Promise.resolve({ ok: true, handshake: "ready" });
    if (this.connecting) return this.connecting;
    const attempt = this.establish().finally(() => {
      this.connecting = null;
    });
    this.connecting = attempt;
    return attempt;
  }

  private async establish(): Promise<ConnectResult> {
    const { port, baudRate, handshakeTimeoutMs } = this.options;
    this.logger.info("Serial connecting", { port, baudRate });

    let transport: LineTransport;
    try {
      transport = this.createTransport(port, baudRate);
    } catch (err) {
      return this.unavailable(err);
    }

    transport.onLine((line) => this.handleLine(line));
    transport.onDisconnect((err) => this.handleDisconnect(transport, err));

    // Registered before open so a device that greets immediately is not missed.
    const handshake = this.expectLine((line) => line === READY_TOKEN, handshakeTimeoutMs);
    try {
      await transport.open();
    } catch (err) {
      handshake.cancel();
      return this.unavailable(err);
    }
    this.transport = transport;
    this.state = "connected";

    const token = await handshake.line;
    if (this.transport !== transport) {
      return { ok: false, error: "link_unavailable", message: "Port closed during handshake" };
    }
    this.state = "ready";
    if (token === null) {
      this.logger.warn("Serial handshake timed out; continuing without it", {
        port,
        timeoutMs: handshakeTimeoutMs,
      });
      return { ok: true, handshake: "timeout" };
    }
    this.logger.info("Serial link ready", { port });
    return { ok: true, handshake: "ready" };
  }

  /** Single command, serialized against gestures and other callers. */
  send(actuator: string, angle: number): Promise<SendResult> {
    return this.withLock((channel) => channel.send(actuator, angle));
  }

  withLock<T>(task: (channel: CommandChannel) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => task(this.channel));
  }

  async close() {
    const transport = this.transport;
    this.transport = null;
    this.state = "disconnected";
    this.flushWaiters();
    if (!transport) return;
    this.logger.info("Closing serial link", { port: transport.path });
    try {
      await transport.close();
    } catch (err) {
      this.logger.warn("Serial close failed", { message: String(err) });
    }
  }

  getState(): LinkState {
    return this.state;
  }

  /** True while a command or gesture holds the link, or callers are queued for it. */
  isBusy(): boolean {
    return this.mutex.isLocked();
  }

  isReady(): boolean {
    return this.state === "ready";
  }

  positionOf(actuator: ActuatorName): number {
    return this.commanded.get(actuator) ?? this.options.actuators[actuator].rest;
  }

  /** Last commanded angle of every actuator, rest angle where nothing was commanded yet. */
  positions(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const name of ACTUATOR_NAMES) out[name] = this.positionOf(name);
    return out;
  }

  private inRange(angle: number): boolean {
    return Number.isInteger(angle) && angle >= this.options.angleMin && angle <= this.options.angleMax;
  }

  private async transmit(name: string, angle: number): Promise<SendResult> {
    const actuator = resolveActuator(name);
    if (!actuator) {
      this.logger.warn("Unknown actuator", { actuator: name });
      return { ok: false, error: "unknown_actuator" };
    }
    if (!this.inRange(angle)) {
      return {
        ok: false,
        error: "out_of_range",
        message: `Angle must be an integer between ${this.options.angleMin} and ${this.options.angleMax}`,
      };
    }
    const transport = this.transport;
    if (!transport || this.state !== "ready") {
      return { ok: false, error: "not_connected" };
    }

    const channel = this.options.actuators[actuator].channel;
    const ack = this.expectLine((line) => line !== READY_TOKEN, this.options.ackTimeoutMs);
    try {
      await transport.write(`${channel}:${angle}\n`);
    } catch (err) {
      ack.cancel();
      this.logger.error("Servo command failed", { actuator, channel, angle, message: String(err) });
      this.markDisconnected(transport);
      return { ok: false, error: "write_failed", message: String(err) };
    }

    const [reply] = await Promise.all([ack.line, sleep(this.options.commandDelayMs)]);
    if (reply === null && this.transport !== transport) {
      return { ok: false, error: "not_connected" };
    }
    if (reply === null) {
      this.logger.warn("No acknowledgment from device", { actuator, channel, angle });
      await this.drainLateReply(transport, actuator, angle);
      return { ok: false, error: "ack_timeout" };
    }
    if (!reply.startsWith(ACK_PREFIX)) {
      this.logger.warn("Device rejected command", { actuator, channel, angle, reply });
      return { ok: false, error: "nack", message: reply };
    }
    this.commanded.set(actuator, angle);
    this.logger.debug("Servo command acknowledged", { actuator, channel, angle });
    return { ok: true, channel, angle };
  }

  /**
   * Replies carry no command id, so a reply that missed its deadline would be
   * read as the next command's. Wait one more ack window under the lock and
   * consume it here.
   */
  private async drainLateReply(transport: LineTransport, actuator: ActuatorName, angle: number) {
    const late = await this.expectLine((line) => line !== READY_TOKEN, this.options.ackTimeoutMs).line;
    if (late === null || this.transport !== transport) return;
    this.logger.warn("Discarded late acknowledgment", { actuator, angle, reply: late });
    if (late.startsWith(ACK_PREFIX)) this.commanded.set(actuator, angle);
  }

  private expectLine(match: (line: string) => boolean, timeoutMs: number) {
    let waiter: Waiter | undefined;
    const line = new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(null);
      }, timeoutMs);
      waiter = { match, resolve, timer };
      this.waiters.push(waiter);
    });
    const cancel = () => {
      if (!waiter) return;
      clearTimeout(waiter.timer);
      this.waiters = this.waiters.filter((w) => w !== waiter);
      waiter.resolve(null);
    };
    return { line, cancel };
  }

  private handleLine(line: string) {
    const waiter = this.waiters.find((w) => w.match(line));
    if (!waiter) {
      this.logger.debug("Unsolicited serial line", { line });
      return;
    }
    clearTimeout(waiter.timer);
    this.waiters = this.waiters.filter((w) => w !== waiter);
    waiter.resolve(line);
  }

  private handleDisconnect(transport: LineTransport, err?: Error) {
    if (this.transport !== transport) return;
    this.logger.error("Serial link lost", { port: transport.path, message: err ? err.message : undefined });
    this.markDisconnected(transport);
  }

  private markDisconnected(transport: LineTransport) {
    if (this.transport !== transport) return;
    this.transport = null;
    this.state = "disconnected";
    this.flushWaiters();
  }

  private flushWaiters() {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) {
      clearTimeout(w.timer);
      w.resolve(null);
    }
  }

  private unavailable(err: unknown): ConnectResult {
    const message = err instanceof Error ? err.message : String(err);
    this.logger.warn("Serial port unavailable; continuing without servo control", {
      port: this.options.port,
      message,
    });
    return { ok: false, error: "link_unavailable", message };
  }
}
