/**
 * In-memory stand-in for a running Resolve instance.
 *
 * Mirrors the scripting API's observable behaviour closely enough to drive the
 * server without the application: ordered timelines that may share names, bins
 * that are never deduplicated, page names checked by the "application".
 * State can be changed behind the server's back through the `simulated*`
 * methods, like a user clicking around in the UI.
 */

import type {
  ConnectionMode,
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
import { RESOLVE_PAGES } from "./resolve-api.js";

export interface SimulatedResolveOptions {
  /** Projects that exist before the session starts. */
  projects?: string[];
  /** Decides whether a path can be imported. Defaults to any non-empty path. */
  canImport?: (filePath: string) => boolean;
  version?: string;
}

export class SimulatedTimeline implements Timeline {
  readonly settings = new Map<string, string>();
  readonly markers = new Map<number, MarkerSpec>();

  constructor(public name: string) {}

  async getName(): Promise<string | null> {
    return this.name;
  }

  async setSetting(name: string, value: string): Promise<boolean> {
    this.settings.set(name, value);
    return true;
  }

  /** One marker per frame, as in the application. */
  async addMarker(marker: MarkerSpec): Promise<boolean> {
    if (marker.frame < 0 || this.markers.has(marker.frame)) return false;
    this.markers.set(marker.frame, { ...marker });
    return true;
  }
}

export class SimulatedFolder implements Folder {
  constructor(public readonly name: string) {}

  async getName(): Promise<string | null> {
    return this.name;
  }
}

export class SimulatedClip implements MediaPoolItem {
  constructor(public readonly filePath: string) {}

  get name(): string {
    const parts = this.filePath.split(/[\\/]/);
    return parts[parts.length - 1] || this.filePath;
  }

  async getName(): Promise<string | null> {
    return this.name;
  }
}

export class SimulatedMediaPool implements MediaPool {
  readonly bins: SimulatedFolder[] = [];
  readonly clips: SimulatedClip[] = [];

  constructor(
    private readonly project: SimulatedProject,
    private readonly canImport: (filePath: string) => boolean
  ) {}

  async importMedia(paths: string[]): Promise<MediaPoolItem[]> {
    if (!paths.every((p) => this.canImport(p))) return [];
    const imported = paths.map((p) => new SimulatedClip(p));
    this.clips.push(...imported);
    return imported;
  }

  async createBin(name: string): Promise<Folder | null> {
    if (!name) return null;
    const bin = new SimulatedFolder(name);
    this.bins.push(bin);
    return bin;
  }

  async createEmptyTimeline(name: string): Promise<Timeline | null> {
    if (!name) return null;
    const timeline = new SimulatedTimeline(name);
    this.project.timelines.push(timeline);
    return timeline;
  }
}

export class SimulatedProject implements Project {
  readonly timelines: SimulatedTimeline[] = [];
  readonly settings = new Map<string, string>();
  readonly mediaPool: SimulatedMediaPool;
  currentTimeline: SimulatedTimeline | null = null;

  constructor(
    public name: string,
    canImport: (filePath: string) => boolean
  ) {
    this.mediaPool = new SimulatedMediaPool(this, canImport);
  }

  async getName(): Promise<string | null> {
    return this.name;
  }

  async getTimelineCount(): Promise<number> {
    return this.timelines.length;
  }

  async getTimelineByIndex(index: number): Promise<Timeline | null> {
    if (!Number.isInteger(index) || index < 1) return null;
    return this.timelines[index - 1] ?? null;
  }

  async getCurrentTimeline(): Promise<Timeline | null> {
    return this.currentTimeline;
  }

  async setCurrentTimeline(timeline: Timeline): Promise<boolean> {
    const owned = this.timelines.find((t) => t === timeline);
    if (!owned) return false;
    this.currentTimeline = owned;
    return true;
  }

  async deleteTimeline(timeline: Timeline): Promise<boolean> {
    const index = this.timelines.findIndex((t) => t === timeline);
    if (index < 0) return false;
    const [removed] = this.timelines.splice(index, 1);
    if (this.currentTimeline === removed) this.currentTimeline = null;
    return true;
  }

  async getMediaPool(): Promise<MediaPool | null> {
    return this.mediaPool;
  }

  async getSetting(name: string): Promise<string | null> {
    return this.settings.get(name) ?? null;
  }

  async setSetting(name: string, value: string): Promise<boolean> {
    this.settings.set(name, value);
    return true;
  }
}

export class SimulatedProjectManager implements ProjectManager {
  readonly projects = new Map<string, SimulatedProject>();
  current: SimulatedProject | null = null;

  constructor(private readonly canImport: (filePath: string) => boolean) {}

  async createProject(name: string): Promise<Project | null> {
    if (!name || this.projects.has(name)) return null;
    const project = new SimulatedProject(name, this.canImport);
    this.projects.set(name, project);
    this.current = project;
    return project;
  }

  async loadProject(name: string): Promise<Project | null> {
    const project = this.projects.get(name);
    if (!project) return null;
    this.current = project;
    return project;
  }

  async saveProject(): Promise<boolean> {
    return this.current !== null;
  }

  async closeProject(project: Project): Promise<boolean> {
    if (this.current === null || this.current !== project) return false;
    this.current = null;
    return true;
  }

  async getCurrentProject(): Promise<Project | null> {
    return this.current;
  }

  async getProjectListInCurrentFolder(): Promise<string[]> {
    return [...this.projects.keys()];
  }
}

export class SimulatedResolve implements ResolveApp {
  readonly projectManager: SimulatedProjectManager;
  currentPage = "media";
  private readonly version: string;

  constructor(options: SimulatedResolveOptions = {}) {
    const canImport = options.canImport ?? ((p: string) => p.length > 0);
    this.projectManager = new SimulatedProjectManager(canImport);
    this.version = options.version ?? "19.1.0";
    for (const name of options.projects ?? []) {
      this.projectManager.projects.set(name, new SimulatedProject(name, canImport));
    }
  }

  async getProjectManager(): Promise<ProjectManager | null> {
    return this.projectManager;
  }

  async openPage(page: string): Promise<boolean> {
    if (!(RESOLVE_PAGES as readonly string[]).includes(page)) return false;
    this.currentPage = page;
    return true;
  }

  async getProductName(): Promise<string | null> {
    return "DaVinci Resolve";
  }

  async getVersionString(): Promise<string | null> {
    return this.version;
  }

  get currentProject(): SimulatedProject | null {
    return this.projectManager.current;
  }

  /** Close the current project as if the user did it in the UI. */
  simulateUserClosedProject(): void {
    this.projectManager.current = null;
  }

  /** Switch the current timeline as if the user did it in the UI. */
  simulateUserSelectedTimeline(name: string): boolean {
    const project = this.projectManager.current;
    const timeline = project?.timelines.find((t) => t.name === name);
    if (!project || !timeline) return false;
    project.currentTimeline = timeline;
    return true;
  }
}

export class SimulationConnector implements ResolveConnector {
  readonly mode: ConnectionMode = "simulation";

  constructor(readonly app: SimulatedResolve = new SimulatedResolve()) {}

  async connect(): Promise<ResolveApp | null> {
    return this.app;
  }

  // In-memory objects are ordinary garbage.
  async retain(): Promise<void> {}

  async close(): Promise<void> {}
}
