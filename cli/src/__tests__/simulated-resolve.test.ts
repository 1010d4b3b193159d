import { describe, it, expect } from "vitest";
import { SimulatedClip, SimulatedResolve, SimulatedTimeline, SimulationConnector } from "../simulated-resolve.js";

describe("SimulatedResolve", () => {
  it("validates page names", async () => {
    const app = new SimulatedResolve();
    expect(await app.openPage("fairlight")).toBe(true);
    expect(app.currentPage).toBe("fairlight");
    expect(await app.openPage("Fairlight")).toBe(false);
    expect(app.currentPage).toBe("fairlight");
  });

  it("makes a created project current and refuses duplicates", async () => {
    const app = new SimulatedResolve();
    const manager = app.projectManager;
    const project = await manager.createProject("Demo");
    expect(app.currentProject).toBe(project);
    expect(await manager.createProject("Demo")).toBeNull();
    expect(await manager.createProject("")).toBeNull();
  });

  it("closes only the current project", async () => {
    const app = new SimulatedResolve({ projects: ["Other"] });
    const manager = app.projectManager;
    const demo = await manager.createProject("Demo");
    const other = await manager.loadProject("Other");
    if (!demo || !other) throw new Error("projects missing");
    expect(await manager.closeProject(demo)).toBe(false);
    expect(await manager.closeProject(other)).toBe(true);
    expect(await manager.saveProject()).toBe(false);
  });

  it("keeps timelines in creation order, duplicates included", async () => {
    const app = new SimulatedResolve();
    const project = await app.projectManager.createProject("Demo");
    const pool = await project?.getMediaPool();
    await pool?.createEmptyTimeline("A");
    await pool?.createEmptyTimeline("A");
    expect(await project?.getTimelineCount()).toBe(2);
    expect(await project?.getTimelineByIndex(0)).toBeNull();
    expect(await (await project?.getTimelineByIndex(2))?.getName()).toBe("A");
    expect(await project?.getTimelineByIndex(3)).toBeNull();
  });

  it("clears the current timeline when it is deleted", async () => {
    const app = new SimulatedResolve();
    await app.projectManager.createProject("Demo");
    const project = app.currentProject;
    if (!project) throw new Error("no project");
    const timeline = await project.mediaPool.createEmptyTimeline("A");
    if (!timeline) throw new Error("no timeline");
    expect(await project.setCurrentTimeline(timeline)).toBe(true);
    expect(await project.deleteTimeline(timeline)).toBe(true);
    expect(project.currentTimeline).toBeNull();
    expect(await project.setCurrentTimeline(timeline)).toBe(false);
  });

  it("connects to the same instance every time", async () => {
    const connector = new SimulationConnector();
    expect(await connector.connect()).toBe(connector.app);
    expect(await connector.connect()).toBe(connector.app);
  });
});

describe("SimulatedTimeline.addMarker", () => {
  it("allows one marker per frame and no negative frames", async () => {
    const timeline = new SimulatedTimeline("A");
    const marker = { frame: 5, color: "Blue", name: "", note: "", duration: 1 };
    expect(await timeline.addMarker(marker)).toBe(true);
    expect(await timeline.addMarker({ ...marker, color: "Red" })).toBe(false);
    expect(await timeline.addMarker({ ...marker, frame: -1 })).toBe(false);
    expect(timeline.markers.get(5)?.color).toBe("Blue");
  });
});

describe("SimulatedClip", () => {
  it("is named after the file", () => {
    expect(new SimulatedClip("/media/day1/clip01.mov").name).toBe("clip01.mov");
    expect(new SimulatedClip("C:\\media\\clip02.mxf").name).toBe("clip02.mxf");
  });
});
