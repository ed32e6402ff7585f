import type {
  AudioCommand,
  Diagnostic,
  DrawCommand,
  InputState,
  Seconds,
  SimSeconds,
} from "@kinetica/contracts";
import { createInputState } from "@kinetica/contracts";
import { clearEdgeFlags, withEdgeDetection } from "../input/edges";
import type { Scene } from "../scene/Scene";

/**
 * Configuration for the game loop.
 */
export interface GameLoopConfig {
  /**
   * Length of one simulation step. Non-positive or non-finite values fall
   * back to the default.
   * @default 1/60
   */
  fixedTimestep?: Seconds;

  /**
   * Upper bound on the real time consumed by a single tick.
   * @default 0.25
   */
  maxFrameTime?: Seconds;

  /**
   * Log to the console whenever a tick's frame time is clamped.
   * @default true
   */
  logClamping?: boolean;
}

const DEFAULT_CONFIG: Required<GameLoopConfig> = {
  fixedTimestep: 1 / 60,
  maxFrameTime: 0.25,
  logClamping: true,
};

function positiveOr(value: number, fallback: number): number {
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

const EMPTY: readonly never[] = Object.freeze([]);

/**
 * Fixed-timestep driver.
 *
 * The host calls tick() with its real frame delta; the loop runs as many
 * fixed steps as the accumulated time covers, so the simulation advances the
 * same way at any frame rate. Leftover time is exposed as interpolationAlpha
 * for render-side smoothing.
 */
export class GameLoop {
  readonly fixedTimestep: Seconds;
  readonly maxFrameTime: Seconds;
  private readonly logClamping: boolean;

  private currentScene: Scene | null = null;
  private accumulator: Seconds = 0;
  private elapsed: SimSeconds = 0;
  private currentInput: InputState = createInputState();
  private previousPointerDown = false;
  private updates = 0;
  private frames = 0;

  constructor(config: GameLoopConfig = {}) {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    this.fixedTimestep = positiveOr(resolved.fixedTimestep, DEFAULT_CONFIG.fixedTimestep);
    this.maxFrameTime = positiveOr(resolved.maxFrameTime, DEFAULT_CONFIG.maxFrameTime);
    this.logClamping = resolved.logClamping;
  }

  // === Scene management ===

  get scene(): Scene | null {
    return this.currentScene;
  }

  /**
   * Makes `scene` the active scene. The accumulator restarts; total time
   * carries on.
   */
  present(scene: Scene): void {
    this.currentScene = scene;
    this.accumulator = 0;
    scene.load();
    console.log(`[GameLoop] Presented scene ${scene.name ?? scene.id}`);
  }

  removeScene(): void {
    const scene = this.currentScene;
    if (scene === null) return;
    this.currentScene = null;
    console.log(`[GameLoop] Removed scene ${scene.name ?? scene.id}`);
  }

  // === Driving ===

  /**
   * Advances the simulation by a real frame delta. Negative or NaN deltas
   * count as zero; deltas above maxFrameTime, infinity included, are clamped.
   */
  tick(realDeltaTime: Seconds, input: InputState): void {
    const scene = this.currentScene;
    if (scene === null || scene.isPaused) {
      this.updates = 0;
      return;
    }

    this.beginFrame(scene, input);

    const frameTime = this.clampFrameTime(scene, realDeltaTime);
    this.accumulator += frameTime;

    let updates = 0;
    while (this.accumulator >= this.fixedTimestep) {
      this.runStep(scene);
      this.accumulator -= this.fixedTimestep;
      updates += 1;
    }
    this.updates = updates;
  }

  /** Runs exactly one fixed step regardless of the accumulator. */
  step(input: InputState): void {
    const scene = this.currentScene;
    if (scene === null || scene.isPaused) {
      this.updates = 0;
      return;
    }

    this.beginFrame(scene, input);
    this.runStep(scene);
    this.updates = 1;
  }

  private beginFrame(scene: Scene, input: InputState): void {
    this.frames += 1;
    scene.audio.beginFrame();
    const detected = withEdgeDetection(input, this.previousPointerDown);
    // Edges from ticks too short to run a step are still pending
    this.currentInput = {
      ...detected,
      pointerJustPressed: detected.pointerJustPressed || this.currentInput.pointerJustPressed,
      pointerJustReleased: detected.pointerJustReleased || this.currentInput.pointerJustReleased,
    };
    this.previousPointerDown = input.pointerDown;
  }

  private runStep(scene: Scene): void {
    scene.input = this.currentInput;
    scene.processFrame(this.fixedTimestep);
    this.elapsed += this.fixedTimestep;
    // Edges are seen by the first step of a tick only
    this.currentInput = clearEdgeFlags(this.currentInput);
  }

  private clampFrameTime(scene: Scene, realDeltaTime: Seconds): Seconds {
    if (Number.isNaN(realDeltaTime) || realDeltaTime < 0) {
      return 0;
    }
    if (realDeltaTime <= this.maxFrameTime) {
      return realDeltaTime;
    }

    scene.reportDiagnostic({
      id: `frame-time-clamped-${this.frames}`,
      category: "timing",
      severity: "warning",
      message: `Frame time ${realDeltaTime}s clamped to ${this.maxFrameTime}s`,
      source: "game-loop",
      persistence: "transient",
    });
    if (this.logClamping) {
      console.log(`[GameLoop] Frame time ${realDeltaTime}s clamped to ${this.maxFrameTime}s`);
    }
    return this.maxFrameTime;
  }

  // === Readouts ===

  /** Fraction of a step left in the accumulator, in [0, 1). */
  get interpolationAlpha(): number {
    return this.accumulator / this.fixedTimestep;
  }

  get updatesThisTick(): number {
    return this.updates;
  }

  get totalTime(): SimSeconds {
    return this.elapsed;
  }

  get updatesPerSecond(): number {
    return 1 / this.fixedTimestep;
  }

  /** Ticks and steps that reached the simulation. */
  get frameCount(): number {
    return this.frames;
  }

  /** Current input. Edge flags stay set until a step has seen them. */
  get input(): InputState {
    return this.currentInput;
  }

  // === Output ===

  generateDrawCommands(): readonly DrawCommand[] {
    return this.currentScene?.generateDrawCommands() ?? EMPTY;
  }

  consumeAudioCommands(): readonly AudioCommand[] {
    return this.currentScene?.audio.consumeCommands() ?? EMPTY;
  }

  get hasAudioCommands(): boolean {
    return this.currentScene?.audio.hasCommands ?? false;
  }

  consumeDiagnostics(): readonly Diagnostic[] {
    return this.currentScene?.consumeDiagnostics() ?? EMPTY;
  }

  /** Clears timing, counters and input history. The scene stays presented. */
  reset(): void {
    this.accumulator = 0;
    this.elapsed = 0;
    this.currentInput = createInputState();
    this.previousPointerDown = false;
    this.updates = 0;
    this.frames = 0;
  }
}
