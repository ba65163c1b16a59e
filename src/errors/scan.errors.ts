export class ScanCancelledError extends Error {
  constructor(reason?: string) {
    super(reason ? `Scan cancelled: ${reason}` : "Scan cancelled.");
    this.name = "ScanCancelledError";
  }
}
