/**
 * Worker Dispatcher
 *
 * Starts one independent asynchronous worker per requested operation and
 * hands back a handle wrapping the operation's result channel. The worker
 * owns copies of its inputs and talks to the caller only through the
 * channel; every worker ends with exactly one terminal message, including
 * when it throws.
 */

import { v4 as uuidv4 } from "uuid";
import { emitOperationCompleted, emitOperationStarted } from "../events/event-bus.js";
import type { ArtifactRecord } from "../registry/types.js";
import { FetchTransport, spawnPiped } from "../transport/index.js";
import type { HttpTransport, ProcessSpawner, ProcessSpec } from "../transport/index.js";
import { getNetworkConfig } from "../utils/config.js";
import { errorMessage } from "../utils/errors.js";
import { dispatchLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import { Channel } from "./channel.js";
import {
  isCheckTerminal,
  isDownloadTerminal,
  isFetchTerminal,
  isHashTerminal,
  isProcessTerminal,
} from "./messages.js";
import type {
  CheckMessage,
  CommitInfo,
  DownloadMessage,
  FetchMessage,
  HashMessage,
  ProcessMessage,
  VersionInfo,
} from "./messages.js";
import { runDownload } from "./workers/download.js";
import type { DownloadRequest } from "./workers/download.js";
import { runHashLocal } from "./workers/hash-local.js";
import { runStalenessCheck } from "./workers/staleness.js";
import { ProcessControl, runSubprocess } from "./workers/subprocess.js";
import type { InputResult } from "./workers/subprocess.js";
import { runFetchShortlog, runFetchVersions, shortlogUrl } from "./workers/versions.js";

export interface OperationMessages {
  "fetch-versions": FetchMessage<VersionInfo>;
  "fetch-shortlog": FetchMessage<CommitInfo>;
  "download-artifact": DownloadMessage;
  "check-staleness": CheckMessage;
  "run-subprocess": ProcessMessage;
  "hash-local": HashMessage;
}

export type OperationKind = keyof OperationMessages;

export type Operation =
  | { kind: "fetch-versions" }
  | { kind: "fetch-shortlog"; from: string; to: string }
  | { kind: "download-artifact"; request: DownloadRequest }
  | { kind: "check-staleness"; record: ArtifactRecord }
  | { kind: "run-subprocess"; spec: ProcessSpec }
  | { kind: "hash-local"; path: string };

/**
 * Consumer end of one operation
 */
export class OperationHandle<K extends OperationKind> {
  readonly id: string;
  readonly kind: K;
  readonly settled: Promise<void>;
  protected channel: Channel<OperationMessages[K]>;

  constructor(id: string, kind: K, channel: Channel<OperationMessages[K]>, settled: Promise<void>) {
    this.id = id;
    this.kind = kind;
    this.channel = channel;
    this.settled = settled;
  }

  /**
   * Next pending message, or undefined. Never blocks.
   */
  poll(): OperationMessages[K] | undefined {
    return this.channel.poll();
  }

  drain(): OperationMessages[K][] {
    return this.channel.drain();
  }

  /**
   * True once the terminal message has been polled
   */
  get finished(): boolean {
    return this.channel.finished;
  }

  /**
   * Lose interest in the results. The worker is not stopped.
   */
  drop(): void {
    this.channel.drop();
  }
}

export class ProcessHandle extends OperationHandle<"run-subprocess"> {
  private control: ProcessControl;

  constructor(id: string, channel: Channel<ProcessMessage>, settled: Promise<void>, control: ProcessControl) {
    super(id, "run-subprocess", channel, settled);
    this.control = control;
  }

  get running(): boolean {
    return this.control.running;
  }

  sendInput(text: string): InputResult {
    return this.control.sendInput(text);
  }

  stop(): boolean {
    return this.control.stop();
  }
}

export type AnyOperationHandle = { [K in OperationKind]: OperationHandle<K> }[OperationKind] | ProcessHandle;

export interface DispatcherOptions {
  http: HttpTransport;
  spawner?: ProcessSpawner;
  tagsUrl: string;
  logUrl: string;
}

type Worker<K extends OperationKind> = (channel: Channel<OperationMessages[K]>) => Promise<void>;

export class Dispatcher {
  private http: HttpTransport;
  private spawner: ProcessSpawner;
  private tagsUrl: string;
  private logUrl: string;

  constructor(options: DispatcherOptions) {
    this.http = options.http;
    this.spawner = options.spawner ?? spawnPiped;
    this.tagsUrl = options.tagsUrl;
    this.logUrl = options.logUrl;
  }

  static fromConfig(): Dispatcher {
    const network = getNetworkConfig();
    return new Dispatcher({
      http: new FetchTransport({ timeoutMs: network.timeout_ms, userAgent: network.user_agent }),
      tagsUrl: network.tags_url,
      logUrl: network.log_url,
    });
  }

  dispatch(operation: Operation): AnyOperationHandle {
    switch (operation.kind) {
      case "fetch-versions":
        return this.fetchVersions();
      case "fetch-shortlog":
        return this.fetchShortlog(operation.from, operation.to);
      case "download-artifact":
        return this.download(operation.request);
      case "check-staleness":
        return this.checkStaleness(operation.record);
      case "run-subprocess":
        return this.runSubprocess(operation.spec);
      case "hash-local":
        return this.hashLocal(operation.path);
    }
  }

  fetchVersions(): OperationHandle<"fetch-versions"> {
    const url = this.tagsUrl;
    const { id, channel, settled } = this.start(
      "fetch-versions",
      url,
      new Channel<FetchMessage<VersionInfo>>(isFetchTerminal),
      (reason) => ({ type: "error", reason }),
      (ch) => runFetchVersions(this.http, url, ch)
    );
    return new OperationHandle(id, "fetch-versions", channel, settled);
  }

  fetchShortlog(from: string, to: string): OperationHandle<"fetch-shortlog"> {
    const url = shortlogUrl(this.logUrl, from, to);
    const { id, channel, settled } = this.start(
      "fetch-shortlog",
      url,
      new Channel<FetchMessage<CommitInfo>>(isFetchTerminal),
      (reason) => ({ type: "error", reason }),
      (ch) => runFetchShortlog(this.http, url, ch)
    );
    return new OperationHandle(id, "fetch-shortlog", channel, settled);
  }

  download(request: DownloadRequest): OperationHandle<"download-artifact"> {
    const inputs: DownloadRequest = { ...request };
    const { id, channel, settled } = this.start(
      "download-artifact",
      inputs.url,
      new Channel<DownloadMessage>(isDownloadTerminal),
      (reason) => ({ type: "error", code: "FILESYSTEM.WRITE", reason }),
      (ch) => runDownload(this.http, inputs, ch)
    );
    return new OperationHandle(id, "download-artifact", channel, settled);
  }

  checkStaleness(record: ArtifactRecord): OperationHandle<"check-staleness"> {
    const snapshot: ArtifactRecord = { ...record };
    const key = `${snapshot.series}/${snapshot.filename}`;
    const { id, channel, settled } = this.start(
      "check-staleness",
      key,
      new Channel<CheckMessage>(isCheckTerminal),
      (reason) => ({ type: "check-error", key, reason }),
      (ch) => runStalenessCheck(this.http, snapshot, ch)
    );
    return new OperationHandle(id, "check-staleness", channel, settled);
  }

  runSubprocess(spec: ProcessSpec): ProcessHandle {
    const inputs: ProcessSpec = { ...spec, args: [...spec.args], env: spec.env ? { ...spec.env } : undefined };
    const control = new ProcessControl();
    const { id, channel, settled } = this.start(
      "run-subprocess",
      [inputs.command, ...inputs.args].join(" "),
      new Channel<ProcessMessage>(isProcessTerminal),
      (reason) => ({ type: "spawn-error", reason }),
      (ch) => runSubprocess(this.spawner, inputs, control, ch)
    );
    return new ProcessHandle(id, channel, settled, control);
  }

  hashLocal(path: string): OperationHandle<"hash-local"> {
    const { id, channel, settled } = this.start(
      "hash-local",
      path,
      new Channel<HashMessage>(isHashTerminal),
      (reason) => ({ type: "error", reason }),
      (ch) => runHashLocal(path, ch)
    );
    return new OperationHandle(id, "hash-local", channel, settled);
  }

  private start<K extends OperationKind>(
    kind: K,
    detail: string,
    channel: Channel<OperationMessages[K]>,
    crash: (reason: string) => OperationMessages[K],
    work: Worker<K>
  ): { id: string; channel: Channel<OperationMessages[K]>; settled: Promise<void> } {
    const id = uuidv4();
    const log = dispatchLogger.with({ operation: id, kind });
    log.debug("Dispatching operation", { detail });
    emitOperationStarted(id, kind, detail);

    const settled = superviseWorker(channel, work, crash, log).then(() => {
      emitOperationCompleted(id, kind, channel.isDropped ? "dropped" : "delivered");
    });
    return { id, channel, settled };
  }
}

/**
 * Run `work` on the next microtask so the caller never waits on it.
 * A throw, or a return without a terminal message, becomes `crash(reason)`.
 * The returned promise never rejects.
 */
export function superviseWorker<M>(
  channel: Channel<M>,
  work: (channel: Channel<M>) => Promise<void>,
  crash: (reason: string) => M,
  log: Logger = dispatchLogger
): Promise<void> {
  return Promise.resolve()
    .then(() => work(channel))
    .catch((error: unknown) => {
      log.error("Worker failed", { error: errorMessage(error) });
      channel.send(crash(errorMessage(error)));
    })
    .then(() => {
      if (!channel.closed) {
        log.error("Worker finished without a terminal message");
        channel.send(crash("Operation ended without a result"));
      }
    });
}
