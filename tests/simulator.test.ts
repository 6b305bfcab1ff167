import fs from "fs";
import os from "os";
import path from "path";
import { getEventListeners, getMaxListeners } from "events";
import { ProgressSimulator } from "../src/infrastructure/simulation/ProgressSimulator.js";
import { TrackStore } from "../src/infrastructure/queue/TrackStore.js";
import { PlaceholderMp3Writer } from "../src/infrastructure/storage/PlaceholderMp3Writer.js";
import { IArtifactWriter } from "../src/core/interfaces/IArtifactWriter.js";
import { TrackJob } from "../src/core/entities/Track.js";

// 10s estimates at this scale take 10ms in total
const FAST = 0.001;

class FailingWriter implements IArtifactWriter {
  calls = 0;

  async write(): Promise<string> {
    this.calls++;
    throw new Error("disk full");
  }

  resolve(fileName: string): string {
    return fileName;
  }
}

class VanishingStore extends TrackStore {
  lookups = 0;

  constructor(private vanishAfter: number) {
    super();
  }

  find(trackId: string): TrackJob | null {
    this.lookups++;
    return this.lookups > this.vanishAfter ? null : super.find(trackId);
  }
}

describe("ProgressSimulator", () => {
  let tmpDir: string;
  let writer: PlaceholderMp3Writer;
  let simulator: ProgressSimulator | null = null;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "track-sim-"));
    writer = new PlaceholderMp3Writer(tmpDir);
  });

  afterEach(async () => {
    if (simulator) {
      await simulator.stop();
      simulator = null;
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test("should step progress from 0 to 100 and complete the track", async () => {
    const store = new TrackStore();
    const progress: number[] = [];
    store.onTrackUpdated((track) => progress.push(track.progress));
    simulator = new ProgressSimulator(store, writer, { timeScale: FAST });

    const { id } = store.create("ambient pads", 12, 10);
    simulator.launch(id);
    await simulator.waitFor(id);

    expect(progress).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);

    const track = store.get(id);
    expect(track.status).toBe("completed");
    expect(track.progress).toBe(100);
    expect(track.downloadUrl).toBe(`/downloads/${id}.mp3`);
    expect(fs.statSync(path.join(tmpDir, `${id}.mp3`)).size).toBe(8 + 12000 + 128);
  });

  test("should report running tasks until they finish", async () => {
    const store = new TrackStore();
    simulator = new ProgressSimulator(store, writer, { timeScale: FAST });

    const first = store.create("one", 5, 10);
    const second = store.create("two", 5, 10);
    simulator.launch(first.id);
    simulator.launch(second.id);
    simulator.launch(first.id);

    expect(simulator.activeCount()).toBe(2);
    expect(simulator.isRunning(first.id)).toBe(true);

    await simulator.drain();

    expect(simulator.activeCount()).toBe(0);
    expect(store.getByStatus("completed")).toHaveLength(2);
  });

  test("should leave the track processing when the artifact cannot be written", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const store = new TrackStore();
    const failing = new FailingWriter();
    simulator = new ProgressSimulator(store, failing, { timeScale: FAST });

    const { id } = store.create("test", 5, 10);
    simulator.launch(id);
    await simulator.waitFor(id);

    const track = store.get(id);
    expect(failing.calls).toBe(1);
    expect(track.status).toBe("processing");
    expect(track.progress).toBe(90);
    expect(track.downloadUrl).toBeUndefined();
    expect(simulator.isRunning(id)).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  test("should stop silently when the track disappears", async () => {
    // initial lookup plus steps 0-2 succeed
    const store = new VanishingStore(4);
    simulator = new ProgressSimulator(store, writer, { timeScale: FAST });

    const { id } = store.create("test", 5, 10);
    simulator.launch(id);
    await simulator.waitFor(id);

    expect(store.lookups).toBe(5);
    expect(store.get(id).status).toBe("processing");
    expect(store.get(id).progress).toBe(20);
    expect(fs.existsSync(path.join(tmpDir, `${id}.mp3`))).toBe(false);
  });

  test("should do nothing for an unknown track", async () => {
    const store = new TrackStore();
    simulator = new ProgressSimulator(store, writer, { timeScale: FAST });

    simulator.launch("track_00000000");
    await simulator.waitFor("track_00000000");

    expect(simulator.activeCount()).toBe(0);
  });

  test("should abort pending steps on stop", async () => {
    const store = new TrackStore();
    const logs: string[] = [];
    const stopped = new ProgressSimulator(store, writer, {
      timeScale: 1,
      debugLog: (message) => logs.push(message),
    });

    const { id } = store.create("long running", 300, 120);
    stopped.launch(id);
    await stopped.stop();

    expect(stopped.activeCount()).toBe(0);
    expect(store.get(id).status).toBe("processing");
    expect(store.get(id).progress).toBe(0);
    expect(logs[logs.length - 1]).toBe(`[ProgressSimulator] Track ${id} stopped after step 0`);
    expect(() => stopped.launch(id)).toThrow("Progress simulator has been stopped");
  });

  test("should run many tracks at once without a listener limit", async () => {
    const controllers: AbortController[] = [];
    const OriginalAbortController = globalThis.AbortController;
    class TrackedAbortController extends OriginalAbortController {
      constructor() {
        super();
        controllers.push(this);
      }
    }

    const store = new TrackStore();
    const createTracked = (): ProgressSimulator => {
      globalThis.AbortController = TrackedAbortController;
      try {
        return new ProgressSimulator(store, writer, { timeScale: 1 });
      } finally {
        globalThis.AbortController = OriginalAbortController;
      }
    };
    const crowded = createTracked();
    simulator = crowded;

    expect(controllers).toHaveLength(1);
    const { signal } = controllers[0];

    for (let i = 0; i < 12; i++) {
      crowded.launch(store.create(`concurrent ${i}`, 30, 60).id);
    }

    expect(crowded.activeCount()).toBe(12);
    expect(getEventListeners(signal, "abort")).toHaveLength(12);
    expect(getMaxListeners(signal)).toBe(0);

    await crowded.stop();
    expect(crowded.activeCount()).toBe(0);
    expect(getEventListeners(signal, "abort")).toHaveLength(0);
  });
});
