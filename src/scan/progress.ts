export type ScanProgressPhase = "discover" | "analyze" | "duplicates" | "report";

export type ScanProgressEvent = {
  phase: ScanProgressPhase;
  current: number;
  total: number;
  message?: string;
};

export type ScanProgressHandler = (event: ScanProgressEvent) => void;
