/**
 * LanguageCoordinator: decides, turn by turn, which language the whole pipeline uses.
 *
 * The state machine is the pure `transitionLanguageState`; the class holds the current state,
 * logs transitions and answers queries. A single mismatched detection never flips the
 * conversation; `switchThreshold` identical mismatches in a row do.
 */

import { isKnownLanguage, languageName } from "../languages";
import { logger as rootLogger, type Logger } from "../logging";

export interface LanguageState {
  selected: string | null;
  detected: string | null;
  /** Last `historySize` detections, oldest first. */
  history: readonly string[];
  consecutiveDifferentCount: number;
  lastDifferentLanguage: string | null;
  turnCount: number;
  /** Auto-switches performed so far. */
  switchCount: number;
}

export type LanguageEvent = { type: "select"; code: string } | { type: "detect"; code: string };

export interface LanguageSwitchOptions {
  switchThreshold: number;
  historySize: number;
  minTurnsBeforeSwitch: number;
}

export interface LanguageCoordinatorConfig extends Partial<LanguageSwitchOptions> {
  /** Fallback when nothing is selected or detected. */
  defaultLanguage: string;
  /** Initial selection; undefined = defaultLanguage, null = start unselected (detect-first). */
  initialLanguage?: string | null;
  logger?: Logger;
}

export interface SwitchStatus extends LanguageState, LanguageSwitchOptions {
  processingLanguage: string;
  /** True once enough turns have passed for an auto-switch to be allowed. */
  canSwitch: boolean;
}

export const DEFAULT_SWITCH_THRESHOLD = 2;
export const DEFAULT_LANGUAGE_HISTORY_SIZE = 5;
export const DEFAULT_MIN_TURNS_BEFORE_SWITCH = 2;

export function initialLanguageState(selected: string | null): LanguageState {
  return {
    selected,
    detected: null,
    history: [],
    consecutiveDifferentCount: 0,
    lastDifferentLanguage: null,
    turnCount: 0,
    switchCount: 0,
  };
}

/** Pure transition: returns the next state, never mutates `state`. */
export function transitionLanguageState(
  state: LanguageState,
  event: LanguageEvent,
  options: LanguageSwitchOptions
): LanguageState {
  if (event.type === "select") {
    return { ...state, selected: event.code, consecutiveDifferentCount: 0, lastDifferentLanguage: null };
  }

  const code = event.code;
  const history = [...state.history, code].slice(-options.historySize);
  const turnCount = state.turnCount + 1;
  const base: LanguageState = { ...state, detected: code, history, turnCount };

  if (state.selected === null || code === state.selected) {
    return { ...base, consecutiveDifferentCount: 0, lastDifferentLanguage: null };
  }

  const consecutiveDifferentCount = code === state.lastDifferentLanguage ? state.consecutiveDifferentCount + 1 : 1;
  if (consecutiveDifferentCount >= options.switchThreshold && turnCount >= options.minTurnsBeforeSwitch) {
    return {
      ...base,
      selected: code,
      consecutiveDifferentCount: 0,
      lastDifferentLanguage: null,
      switchCount: state.switchCount + 1,
    };
  }
  return { ...base, consecutiveDifferentCount, lastDifferentLanguage: code };
}

export class LanguageCoordinator {
  private state: LanguageState;
  private readonly options: LanguageSwitchOptions;
  private readonly defaultLanguage: string;
  private readonly initialSelection: string | null;
  private readonly log: Logger;

  constructor(config: LanguageCoordinatorConfig) {
    this.defaultLanguage = config.defaultLanguage;
    this.options = {
      switchThreshold: config.switchThreshold ?? DEFAULT_SWITCH_THRESHOLD,
      historySize: config.historySize ?? DEFAULT_LANGUAGE_HISTORY_SIZE,
      minTurnsBeforeSwitch: config.minTurnsBeforeSwitch ?? DEFAULT_MIN_TURNS_BEFORE_SWITCH,
    };
    if (this.options.switchThreshold < 1 || this.options.historySize < 1 || this.options.minTurnsBeforeSwitch < 0) {
      throw new RangeError("switchThreshold and historySize must be >= 1, minTurnsBeforeSwitch >= 0");
    }
    this.initialSelection = config.initialLanguage === undefined ? config.defaultLanguage : config.initialLanguage;
    this.state = initialLanguageState(this.initialSelection);
    this.log = config.logger ?? rootLogger;
  }

  /** Explicit selection (e.g. IVR choice). Clears any mismatch streak. */
  setLanguage(code: string): void {
    if (!isKnownLanguage(code)) {
      this.log.warn({ event: "LANGUAGE_UNKNOWN", code }, "Selected language is not in the registry");
    }
    this.state = transitionLanguageState(this.state, { type: "select", code }, this.options);
    this.log.info({ event: "LANGUAGE_SELECTED", code, name: languageName(code) }, "Language selected");
  }

  /** Feed one detection (once per completed transcription). Returns true when it caused an auto-switch. */
  setDetectedLanguage(code: string): boolean {
    const previous = this.state;
    this.state = transitionLanguageState(this.state, { type: "detect", code }, this.options);
    const switched = this.state.switchCount > previous.switchCount;
    if (switched) {
      this.log.info(
        { event: "LANGUAGE_AUTO_SWITCH", from: previous.selected, to: code, turnCount: this.state.turnCount },
        `Language auto-switched to ${languageName(code)}`
      );
    } else {
      this.log.debug(
        { event: "LANGUAGE_DETECTED", code, consecutiveDifferentCount: this.state.consecutiveDifferentCount },
        "Language detected"
      );
    }
    return switched;
  }

  /** The single language every stage must use for this turn: selected, else detected, else default. */
  ensureConsistency(): string {
    const { selected, detected } = this.state;
    if (selected && detected && selected !== detected) {
      this.log.debug({ event: "LANGUAGE_MISMATCH", selected, detected }, "Detected language differs from selected");
    }
    return selected ?? detected ?? this.defaultLanguage;
  }

  /** True unless both a selection and a detection exist and they differ. */
  isConsistent(): boolean {
    const { selected, detected } = this.state;
    return !(selected && detected && selected !== detected);
  }

  getLanguageName(code?: string): string {
    return languageName(code ?? this.ensureConsistency());
  }

  getSwitchStatus(): SwitchStatus {
    const { selected, detected } = this.state;
    return {
      ...this.state,
      history: [...this.state.history],
      ...this.options,
      processingLanguage: selected ?? detected ?? this.defaultLanguage,
      canSwitch: this.state.turnCount >= this.options.minTurnsBeforeSwitch,
    };
  }

  reset(): void {
    this.state = initialLanguageState(this.initialSelection);
    this.log.debug({ event: "LANGUAGE_RESET" }, "Language coordinator reset");
  }
}
