import {
  DEFAULT_ALPHABET,
  DEFAULT_WINDOW_RADIUS,
  DisplayData,
  EngineConfig,
  PracticeSymbol,
  SessionStats,
  WindowState,
} from "@numdrill/types";
import { SymbolGenerator, RandomSource } from "@numdrill/generator";
import {
  beginStats,
  createInitialStats,
  createWindow,
  getAlphabet,
  getCharStatuses,
  getWindowLength,
  isAcceptedSymbol,
  recordKeystroke,
  shouldSlide,
  slideWindow,
  tickStats,
  toStatsView,
  typeSymbol,
} from "@numdrill/core";

type Listener = (data: DisplayData) => void;

export interface EngineOptions {
  random?: RandomSource;
  now?: () => number; // epoch ms
}

export class TestEngine {
  // ------------------------
  // Engine State
  // ------------------------

  private window: WindowState | null = null; // seeded by start()
  private stats: SessionStats = createInitialStats();
  private isActive = false;

  private listeners: Listener[] = [];

  // ------------------------
  // Core components
  // ------------------------

  private readonly config: EngineConfig;
  private readonly alphabet: readonly PracticeSymbol[];
  private readonly generator: SymbolGenerator;
  private readonly now: () => number;

  constructor(config: Partial<EngineConfig> = {}, options: EngineOptions = {}) {
    this.config = {
      windowRadius: config.windowRadius ?? DEFAULT_WINDOW_RADIUS,
      alphabet: config.alphabet ?? DEFAULT_ALPHABET,
    };

    const radius = this.config.windowRadius;
    if (!Number.isInteger(radius) || radius < 0) {
      throw new RangeError(`Window radius must be a non-negative integer, got ${radius}`);
    }

    this.alphabet = getAlphabet(this.config.alphabet);
    this.generator = new SymbolGenerator(this.alphabet, options.random);
    this.now = options.now ?? (() => Date.now());
  }

  // ------------------------
  // Lifecycle
  // ------------------------

  start() {
    this.window = this.seedWindow();
    this.stats = beginStats(this.now());
    this.isActive = true;
    this.notify();
  }

  stop() {
    // Only the first stop freezes the clock; later calls keep the frozen value
    if (this.isActive) {
      this.stats = tickStats(this.stats, this.now());
      this.isActive = false;
    }
    this.notify();
  }

  reset() {
    this.start();
  }

  // ------------------------
  // Input handling
  // ------------------------

  processInput(symbol: string): boolean {
    if (!this.isActive || !this.window) return false;
    if (!isAcceptedSymbol(this.alphabet, symbol)) return false;

    const { window, isCorrect } = typeSymbol(this.window, symbol);
    this.window = window;
    this.stats = tickStats(recordKeystroke(this.stats, isCorrect), this.now());

    if (shouldSlide(this.window)) {
      this.window = slideWindow(this.window, this.generator.nextSymbol());
    }

    this.notify();
    return true;
  }

  tick() {
    if (!this.isActive) return;
    this.stats = tickStats(this.stats, this.now());
    this.notify();
  }

  // ------------------------
  // Read access
  // ------------------------

  getDisplayData(): DisplayData {
    if (this.isActive) {
      this.stats = tickStats(this.stats, this.now());
    }
    return this.snapshot();
  }

  // Callers get copies; the live window and stats stay private to the engine
  getWindow(): WindowState | null {
    if (!this.window) return null;
    return { ...this.window, target: [...this.window.target], typed: [...this.window.typed] };
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  getConfig(): Readonly<EngineConfig> {
    return this.config;
  }

  get active(): boolean {
    return this.isActive;
  }

  subscribe(listener: Listener) {
    this.listeners.push(listener);
    listener(this.snapshot());
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private notify() {
    const data = this.snapshot();
    this.listeners.forEach((l) => l(data));
  }

  private snapshot(): DisplayData {
    return {
      cells: this.window ? getCharStatuses(this.window) : [],
      stats: toStatsView(this.stats),
      isActive: this.isActive,
    };
  }

  private seedWindow(): WindowState {
    const radius = this.config.windowRadius;
    return createWindow(this.generator.generateSequence(getWindowLength(radius)), radius);
  }
}
