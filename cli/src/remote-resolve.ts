/**
 * Capability interfaces implemented over the Python bridge, plus the connector
 * that starts the bridge process.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Logger } from "pino";
import { getLogger } from "./logger.js";
import type { BridgeTransport, BridgeValue } from "./python-bridge.js";
import { BridgeClient, BridgeError, ProcessTransport, ROOT_HANDLE, RemoteHandle } from "./python-bridge.js";
import type {
  Folder,
  MarkerSpec,
  MediaPool,
  MediaPoolItem,
  Project,
  ProjectManager,
  ResolveApp,
  ResolveConnector,
  Timeline,
} from "./resolve-api.js";

abstract class RemoteObject {
  constructor(
    protected readonly bridge: BridgeClient,
    readonly handle: RemoteHandle
  ) {}

  protected call(method: string, ...args: BridgeValue[]): Promise<BridgeValue> {
    return this.bridge.call(this.handle.id, method, args);
  }

  protected async callString(method: string, ...args: BridgeValue[]): Promise<string | null> {
    const value = await this.call(method, ...args);
    return typeof value === "string" ? value : null;
  }

  protected async callBoolean(method: string, ...args: BridgeValue[]): Promise<boolean> {
    return (await this.call(method, ...args)) === true;
  }

  protected async callObject(method: string, ...args: BridgeValue[]): Promise<RemoteHandle | null> {
    const value = await this.call(method, ...args);
    return value instanceof RemoteHandle ? value : null;
  }
}

/** Handle of an object that came from this bridge; anything else cannot be passed back. */
function handleOf(value: object): RemoteHandle {
  if (value instanceof RemoteObject) return value.handle;
  throw new BridgeError("Object does not belong to the connected Resolve instance");
}

class RemoteNamed extends RemoteObject {
  getName(): Promise<string | null> {
    return this.callString("GetName");
  }
}

export class RemoteFolder extends RemoteNamed implements Folder {}

export class RemoteMediaPoolItem extends RemoteNamed implements MediaPoolItem {}

export class RemoteTimeline extends RemoteNamed implements Timeline {
  setSetting(name: string, value: string): Promise<boolean> {
    return this.callBoolean("SetSetting", name, value);
  }

  addMarker(marker: MarkerSpec): Promise<boolean> {
    return this.callBoolean("AddMarker", marker.frame, marker.color, marker.name, marker.note, marker.duration);
  }
}

export class RemoteMediaPool extends RemoteObject implements MediaPool {
  async importMedia(paths: string[]): Promise<MediaPoolItem[]> {
    const items = await this.call("ImportMedia", paths);
    if (!Array.isArray(items)) return [];
    return items
      .filter((item): item is RemoteHandle => item instanceof RemoteHandle)
      .map((item) => new RemoteMediaPoolItem(this.bridge, item));
  }

  async createBin(name: string): Promise<Folder | null> {
    const root = await this.callObject("GetRootFolder");
    if (!root) return null;
    const folder = await this.callObject("AddSubFolder", root, name);
    return folder && new RemoteFolder(this.bridge, folder);
  }

  async createEmptyTimeline(name: string): Promise<Timeline | null> {
    const timeline = await this.callObject("CreateEmptyTimeline", name);
    return timeline && new RemoteTimeline(this.bridge, timeline);
  }

  deleteTimelines(timelines: Timeline[]): Promise<boolean> {
    return this.callBoolean("DeleteTimelines", timelines.map(handleOf));
  }
}

export class RemoteProject extends RemoteNamed implements Project {
  async getTimelineCount(): Promise<number> {
    const count = await this.call("GetTimelineCount");
    return typeof count === "number" ? count : 0;
  }

  async getTimelineByIndex(index: number): Promise<Timeline | null> {
    const timeline = await this.callObject("GetTimelineByIndex", index);
    return timeline && new RemoteTimeline(this.bridge, timeline);
  }

  async getCurrentTimeline(): Promise<Timeline | null> {
    const timeline = await this.callObject("GetCurrentTimeline");
    return timeline && new RemoteTimeline(this.bridge, timeline);
  }

  setCurrentTimeline(timeline: Timeline): Promise<boolean> {
    return this.callBoolean("SetCurrentTimeline", handleOf(timeline));
  }

  // Resolve deletes timelines through the media pool.
  async deleteTimeline(timeline: Timeline): Promise<boolean> {
    const pool = await this.remoteMediaPool();
    return pool ? pool.deleteTimelines([timeline]) : false;
  }

  getMediaPool(): Promise<MediaPool | null> {
    return this.remoteMediaPool();
  }

  getSetting(name: string): Promise<string | null> {
    return this.callString("GetSetting", name);
  }

  setSetting(name: string, value: string): Promise<boolean> {
    return this.callBoolean("SetSetting", name, value);
  }

  private async remoteMediaPool(): Promise<RemoteMediaPool | null> {
    const pool = await this.callObject("GetMediaPool");
    return pool && new RemoteMediaPool(this.bridge, pool);
  }
}

export class RemoteProjectManager extends RemoteObject implements ProjectManager {
  async createProject(name: string): Promise<Project | null> {
    const project = await this.callObject("CreateProject", name);
    return project && new RemoteProject(this.bridge, project);
  }

  async loadProject(name: string): Promise<Project | null> {
    const project = await this.callObject("LoadProject", name);
    return project && new RemoteProject(this.bridge, project);
  }

  saveProject(): Promise<boolean> {
    return this.callBoolean("SaveProject");
  }

  closeProject(project: Project): Promise<boolean> {
    return this.callBoolean("CloseProject", handleOf(project));
  }

  async getCurrentProject(): Promise<Project | null> {
    const project = await this.callObject("GetCurrentProject");
    return project && new RemoteProject(this.bridge, project);
  }

  async getProjectListInCurrentFolder(): Promise<string[]> {
    const names = await this.call("GetProjectListInCurrentFolder");
    if (!Array.isArray(names)) return [];
    return names.filter((name): name is string => typeof name === "string");
  }
}

export class RemoteResolve extends RemoteObject implements ResolveApp {
  constructor(bridge: BridgeClient) {
    super(bridge, new RemoteHandle(ROOT_HANDLE));
  }

  async getProjectManager(): Promise<ProjectManager | null> {
    const manager = await this.callObject("GetProjectManager");
    return manager && new RemoteProjectManager(this.bridge, manager);
  }

  openPage(page: string): Promise<boolean> {
    return this.callBoolean("OpenPage", page);
  }

  getProductName(): Promise<string | null> {
    return this.callString("GetProductName");
  }

  getVersionString(): Promise<string | null> {
    return this.callString("GetVersionString");
  }
}

/** `bridge/resolve_bridge.py`, found beside `src/` and `dist/` alike. */
export const BRIDGE_SCRIPT_PATH = fileURLToPath(new URL("../bridge/resolve_bridge.py", import.meta.url));

export interface PythonConnectorOptions {
  executable: string;
  modulesPath?: string;
  libPath?: string;
  scriptPath?: string;
  /** Replaces the child process; tests pass an in-process transport. */
  openTransport?: () => BridgeTransport;
  log?: Logger;
}

/**
 * Connects through a Python child process. A failed attempt resolves to null
 * and leaves nothing running; the next `connect` starts over.
 */
export class PythonConnector implements ResolveConnector {
  readonly mode = "python" as const;
  private client: BridgeClient | null = null;
  private app: RemoteResolve | null = null;
  private readonly log: Logger;

  constructor(private readonly options: PythonConnectorOptions) {
    this.log = options.log ?? getLogger("bridge");
  }

  async connect(): Promise<ResolveApp | null> {
    if (this.app && this.client?.alive) return this.app;
    await this.close();
    const client = new BridgeClient(this.openTransport(), this.log);
    try {
      await client.start();
    } catch (err) {
      this.log.warn({ err }, "DaVinci Resolve is not reachable");
      await client.close();
      return null;
    }
    this.client = client;
    this.app = new RemoteResolve(client);
    this.log.info("connected to DaVinci Resolve");
    return this.app;
  }

  async retain(keep: readonly object[]): Promise<void> {
    if (!this.client?.alive) return;
    const handles = keep.filter((value) => value instanceof RemoteObject).map(handleOf);
    await this.client.retain(handles);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.app = null;
    if (client) await client.close();
  }

  private openTransport(): BridgeTransport {
    if (this.options.openTransport) return this.options.openTransport();
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (this.options.modulesPath) {
      env.PYTHONPATH = [this.options.modulesPath, env.PYTHONPATH].filter(Boolean).join(path.delimiter);
      env.RESOLVE_SCRIPT_API = path.dirname(this.options.modulesPath);
    }
    if (this.options.libPath) {
      env.RESOLVE_SCRIPT_LIB = this.options.libPath;
    }
    return new ProcessTransport({
      executable: this.options.executable,
      scriptPath: this.options.scriptPath ?? BRIDGE_SCRIPT_PATH,
      env,
      log: this.log,
    });
  }
}
