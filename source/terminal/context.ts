import { supportsColor } from "chalk";
import { defaultConfig, readEnvOverrides } from "../config.ts";
import { logger } from "../logger.ts";
import type { OutputKind, OutputSettings, TextSink } from "./types.ts";

export type ColorLevel = 0 | 1 | 2 | 3;

/**
 * Color support as reported by chalk: `false`, or the detected level.
 */
export type ColorProbe = { level: ColorLevel } | false;

export interface Capabilities {
  useColor: boolean;
  colorLevel: ColorLevel;
  terminalWidth: number;
}

/**
 * Probe a stream for color and width. Only an interactive stream with at
 * least basic (8 color) support gets colors; anything else falls back to
 * colorless output at the default width.
 */
export function detectCapabilities(
  stream: TextSink,
  probe: ColorProbe = supportsColor,
): Capabilities {
  if (!stream.isTTY || probe === false || probe.level < 1) {
    return {
      useColor: false,
      colorLevel: 0,
      terminalWidth: defaultConfig.settings.terminalWidth,
    };
  }
  return {
    useColor: true,
    colorLevel: probe.level,
    terminalWidth: stream.columns || defaultConfig.settings.terminalWidth,
  };
}

export interface OutputContextOptions {
  settings?: Partial<OutputSettings>;
  env?: NodeJS.ProcessEnv;
  probe?: ColorProbe;
  colorLevel?: ColorLevel;
}

/**
 * Holds the output configuration and the kind of the last emission.
 *
 * Settings start from the defaults, are replaced by what `initialize`
 * detects, then by environment overrides, then by explicitly passed
 * settings. They stay mutable afterwards.
 */
export class OutputContext {
  readonly settings: OutputSettings;
  lastOutput: OutputKind = "unset";
  private colorLevel: ColorLevel;
  private initialized = false;
  private readonly env: NodeJS.ProcessEnv;
  private readonly probe: ColorProbe;
  private readonly explicit: Partial<OutputSettings>;

  constructor(options: OutputContextOptions = {}) {
    this.env = options.env ?? process.env;
    this.probe = options.probe ?? supportsColor;
    this.explicit = options.settings ?? {};
    this.colorLevel = options.colorLevel ?? 1;
    this.settings = { ...defaultConfig.settings, ...this.explicit };
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Detect terminal capabilities once. Later calls do nothing.
   */
  initialize(stream: TextSink): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;

    const detected = detectCapabilities(stream, this.probe);
    if (detected.colorLevel > 0) {
      this.colorLevel = detected.colorLevel;
    }
    Object.assign(
      this.settings,
      {
        useColor: detected.useColor,
        terminalWidth: detected.terminalWidth,
      },
      readEnvOverrides(this.env),
      this.explicit,
    );
    logger.debug(
      { detected, settings: this.settings },
      "Output context initialized",
    );
  }

  /**
   * Chalk level to render with: 0 when colors are off.
   */
  get level(): ColorLevel {
    return this.settings.useColor ? this.colorLevel : 0;
  }

  get isQuiet(): boolean {
    return this.settings.verbosity === "quiet";
  }

  /**
   * Forget the last emission kind.
   */
  reset(): void {
    this.lastOutput = "unset";
  }
}
