/**
 * Capability surface of the DaVinci Resolve scripting API, as seen by the server.
 *
 * Every accessor is async and may reject. An absent object (no project open,
 * no current timeline, a failed create) is `null`, never `undefined`; boolean
 * operations report the application's own success flag.
 */

export interface ResolveApp {
  getProjectManager(): Promise<ProjectManager | null>;
  /** Switch UI page. Page names are validated by the application, not here. */
  openPage(page: string): Promise<boolean>;
  getProductName(): Promise<string | null>;
  getVersionString(): Promise<string | null>;
}

export interface ProjectManager {
  createProject(name: string): Promise<Project | null>;
  loadProject(name: string): Promise<Project | null>;
  saveProject(): Promise<boolean>;
  closeProject(project: Project): Promise<boolean>;
  getCurrentProject(): Promise<Project | null>;
  getProjectListInCurrentFolder(): Promise<string[]>;
}

export interface Project {
  getName(): Promise<string | null>;
  getTimelineCount(): Promise<number>;
  /** 1-based, like the scripting API. */
  getTimelineByIndex(index: number): Promise<Timeline | null>;
  getCurrentTimeline(): Promise<Timeline | null>;
  setCurrentTimeline(timeline: Timeline): Promise<boolean>;
  deleteTimeline(timeline: Timeline): Promise<boolean>;
  getMediaPool(): Promise<MediaPool | null>;
  getSetting(name: string): Promise<string | null>;
  setSetting(name: string, value: string): Promise<boolean>;
}

export interface MediaPool {
  /** Batch import. An empty array means nothing was imported. */
  importMedia(paths: string[]): Promise<MediaPoolItem[]>;
  createBin(name: string): Promise<Folder | null>;
  createEmptyTimeline(name: string): Promise<Timeline | null>;
}

export interface Timeline {
  getName(): Promise<string | null>;
  setSetting(name: string, value: string): Promise<boolean>;
  addMarker(marker: MarkerSpec): Promise<boolean>;
}

export interface MediaPoolItem {
  getName(): Promise<string | null>;
}

export interface Folder {
  getName(): Promise<string | null>;
}

export interface MarkerSpec {
  frame: number;
  color: string;
  name: string;
  note: string;
  duration: number;
}

/** UI pages known to current Resolve releases. */
export const RESOLVE_PAGES = ["media", "cut", "edit", "fusion", "color", "fairlight", "deliver"] as const;

/** Timeline setting keys used when creating timelines. */
export const TimelineSetting = {
  FrameRate: "timelineFrameRate",
  ResolutionWidth: "timelineResolutionWidth",
  ResolutionHeight: "timelineResolutionHeight",
} as const;

/**
 * Source of the root application object. `connect` resolves to `null` when the
 * application cannot be reached; callers may try again on a later call.
 */
export interface ResolveConnector {
  readonly mode: ConnectionMode;
  connect(): Promise<ResolveApp | null>;
  /** Let go of every application object handed out so far except `keep`. Called after each dispatch. */
  retain(keep: readonly object[]): Promise<void>;
  close(): Promise<void>;
}

export type ConnectionMode = "simulation" | "python";
