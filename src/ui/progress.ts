import type { ScanProgressEvent, ScanProgressHandler, ScanProgressPhase } from "../scan/progress.js";

export class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => void }) {}

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clear();
  }

  private render() {
    if (!this.stream.isTTY) return;
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }

  private clear() {
    if (!this.stream.isTTY) return;
    this.stream.write("\r\x1b[2K");
  }
}

const PROGRESS_PHASES: readonly ScanProgressPhase[] = ["discover", "analyze", "duplicates", "report"];

const PROGRESS_PHASE_LABELS: Record<ScanProgressPhase, string> = {
  discover: "Discovering files",
  analyze: "Analyzing",
  duplicates: "Duplicate detection",
  report: "Quality gate"
};

const PROGRESS_PHASE_WEIGHTS: Record<ScanProgressPhase, number> = {
  discover: 1,
  analyze: 8,
  duplicates: 1,
  report: 1
};

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

export function renderProgressBar(value: number, width = 24): string {
  const normalized = clampProgress(value);
  const filled = Math.round(normalized * width);
  const empty = Math.max(0, width - filled);
  const bar = `${"#".repeat(filled)}${"-".repeat(empty)}`;
  const percent = Math.round(normalized * 100);
  return `[${bar}] ${percent}%`;
}

export function createProgressReporter(update: (message: string) => void): ScanProgressHandler {
  const fractions = new Map<ScanProgressPhase, number>();
  PROGRESS_PHASES.forEach((phase) => fractions.set(phase, 0));
  const weightedTotal = PROGRESS_PHASES.reduce((sum, phase) => sum + PROGRESS_PHASE_WEIGHTS[phase], 0);

  return (event: ScanProgressEvent) => {
    const total = Math.max(0, Math.trunc(event.total));
    const current = Math.max(0, Math.trunc(event.current));
    const fraction = total === 0 ? 1 : clampProgress(current / total);
    fractions.set(event.phase, fraction);

    const weightedCompleted = PROGRESS_PHASES.reduce(
      (sum, phase) => sum + PROGRESS_PHASE_WEIGHTS[phase] * (fractions.get(phase) ?? 0),
      0
    );
    const bar = renderProgressBar(weightedCompleted / weightedTotal);
    const label = PROGRESS_PHASE_LABELS[event.phase];
    const detail = event.phase === "analyze" ? `${Math.min(current, total)}/${total}` : event.message ?? "";
    update(detail ? `${bar} ${label} (${detail})` : `${bar} ${label}`);
  };
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}
