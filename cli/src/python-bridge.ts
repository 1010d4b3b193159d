/**
 * Line-delimited JSON channel to `bridge/resolve_bridge.py`.
 *
 * The Python side owns the real scripting objects and keeps them in a handle
 * registry; this side only ever sees integer handles. Handle 0 is the Resolve
 * application. Wire format, one JSON object per line:
 *
 *   ready    ← {"ready": true} | {"ready": false, "error": "..."}
 *   request  → {"id": 7, "target": 3, "method": "GetName", "args": []}
 *   retain   → {"id": 8, "retain": [3, 5]}
 *   response ← {"id": 7, "result": ...} | {"id": 7, "error": "..."}
 *
 * Objects travel as `{"$handle": n}` in both directions. A retain request drops
 * every handle except the root and the ones listed.
 */

import { spawn } from "node:child_process";
import type { ChildProcessWithoutNullStreams } from "node:child_process";
import * as readline from "node:readline";
import type { Logger } from "pino";
import { getLogger } from "./logger.js";

export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
  }
}

/** A scripting call reached Resolve and raised there. */
export class ResolveCallError extends Error {
  constructor(
    public readonly method: string,
    message: string
  ) {
    super(`${method}: ${message}`);
    this.name = "ResolveCallError";
  }
}

export const ROOT_HANDLE = 0;

export class RemoteHandle {
  constructor(readonly id: number) {}

  toJSON(): { $handle: number } {
    return { $handle: this.id };
  }
}

export type BridgeValue =
  | string
  | number
  | boolean
  | null
  | RemoteHandle
  | BridgeValue[]
  | { [key: string]: BridgeValue };

export interface BridgeTransport {
  readonly closed: boolean;
  write(line: string): Promise<void>;
  /** Next line from the bridge. Rejects with BridgeError once the bridge is gone. */
  readLine(): Promise<string>;
  close(): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeBridgeValue(value: unknown): BridgeValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(decodeBridgeValue);
  }
  if (isRecord(value)) {
    const handle = value.$handle;
    if (typeof handle === "number" && Object.keys(value).length === 1) {
      return new RemoteHandle(handle);
    }
    const out: { [key: string]: BridgeValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = decodeBridgeValue(entry);
    }
    return out;
  }
  throw new BridgeError(`Bridge protocol error: unexpected value ${String(value)}`);
}

/**
 * Request/response client over a transport. Calls are queued so that exactly
 * one request is outstanding at a time.
 */
export class BridgeClient {
  private nextId = 1;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly transport: BridgeTransport,
    private readonly log: Logger = getLogger("bridge")
  ) {}

  get alive(): boolean {
    return !this.transport.closed;
  }

  /** Wait for the bridge's ready line. */
  async start(): Promise<void> {
    const ready = this.parse(await this.transport.readLine());
    if (ready.ready === true) return;
    const reason = typeof ready.error === "string" ? ready.error : "bridge did not report ready";
    throw new BridgeError(`Could not connect to DaVinci Resolve: ${reason}`);
  }

  call(target: number, method: string, args: BridgeValue[] = []): Promise<BridgeValue> {
    return this.enqueue(method, { target, method, args });
  }

  /** Release every bridge-side object except the root and `keep`. */
  async retain(keep: RemoteHandle[]): Promise<void> {
    await this.enqueue("retain", { retain: keep.map((handle) => handle.id) });
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private enqueue(label: string, body: Record<string, BridgeValue>): Promise<BridgeValue> {
    const run = this.tail.then(() => this.send(label, body));
    // The queue only orders calls; each caller still sees its own rejection.
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** A BridgeError closes the transport; the connector starts a new bridge on its next connect. */
  private async send(label: string, body: Record<string, BridgeValue>): Promise<BridgeValue> {
    try {
      return await this.exchange(label, body);
    } catch (err) {
      if (err instanceof BridgeError && !this.transport.closed) {
        this.log.warn({ err }, "closing bridge");
        await this.transport.close();
      }
      throw err;
    }
  }

  private async exchange(label: string, body: Record<string, BridgeValue>): Promise<BridgeValue> {
    const id = this.nextId++;
    this.log.trace({ id, request: label }, "bridge call");
    await this.transport.write(JSON.stringify({ id, ...body }));
    const reply = this.parse(await this.transport.readLine());
    if (reply.id !== id) {
      throw new BridgeError(`Bridge protocol error: expected response ${id}, got ${String(reply.id)}`);
    }
    if (typeof reply.error === "string") {
      throw new ResolveCallError(label, reply.error);
    }
    return decodeBridgeValue(reply.result ?? null);
  }

  private parse(line: string): Record<string, unknown> {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (err) {
      throw new BridgeError(`Bridge protocol error: unparsable line ${JSON.stringify(line)}`, { cause: err });
    }
    if (!isRecord(message)) {
      throw new BridgeError(`Bridge protocol error: expected an object, got ${line}`);
    }
    return message;
  }
}

export interface ProcessTransportOptions {
  executable: string;
  scriptPath: string;
  env: NodeJS.ProcessEnv;
  log?: Logger;
}

/** Transport over a child process's stdin/stdout. Its stderr is logged. */
export class ProcessTransport implements BridgeTransport {
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly lines: string[] = [];
  private readonly waiters: Array<{ resolve: (line: string) => void; reject: (err: Error) => void }> = [];
  private failure: BridgeError | null = null;

  constructor(options: ProcessTransportOptions) {
    const log = options.log ?? getLogger("bridge");
    this.child = spawn(options.executable, [options.scriptPath], { env: options.env, stdio: ["pipe", "pipe", "pipe"] });

    readline.createInterface({ input: this.child.stdout, terminal: false }).on("line", (line) => {
      const waiter = this.waiters.shift();
      if (waiter) waiter.resolve(line);
      else this.lines.push(line);
    });
    readline.createInterface({ input: this.child.stderr, terminal: false }).on("line", (line) => {
      log.debug({ stderr: line }, "bridge stderr");
    });

    this.child.stdin.on("error", (err) => {
      this.fail(new BridgeError(`Bridge input closed: ${err.message}`, { cause: err }));
    });
    this.child.on("error", (err) => {
      this.fail(new BridgeError(`Could not start ${options.executable}: ${err.message}`, { cause: err }));
    });
    this.child.on("exit", (code, signal) => {
      log.info({ code, signal }, "bridge process exited");
      this.fail(new BridgeError(`Bridge process exited (${signal ?? `code ${String(code)}`})`));
    });
  }

  get closed(): boolean {
    return this.failure !== null;
  }

  async write(line: string): Promise<void> {
    if (this.failure) throw this.failure;
    await new Promise<void>((resolve, reject) => {
      this.child.stdin.write(line + "\n", (err) => (err ? reject(new BridgeError(err.message, { cause: err })) : resolve()));
    });
  }

  readLine(): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  async close(): Promise<void> {
    if (this.failure) return;
    this.fail(new BridgeError("Bridge closed"));
    this.child.stdin.end();
    this.child.kill();
  }

  private fail(err: BridgeError): void {
    if (this.failure) return;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }
}
