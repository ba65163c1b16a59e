import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { XMLParser } from "fast-xml-parser";
import { ConfigCoverageMalformedError, ConfigCoverageMissingError } from "../errors/config.errors.js";

export type CoverageData = {
  /** Covered fraction of lines, 0..1. */
  lineRate: number;
  /** lineRate as a percentage, 0..100. */
  percent: number;
  linesCovered: number | null;
  linesValid: number | null;
};

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseAttributeValue: false
});

function readAttribute(element: Record<string, unknown>, name: string): string | null {
  const value = element[`@_${name}`];
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function toNumber(raw: string | null, attribute: string, filePath: string, integer: boolean): number | null {
  if (raw === null) return null;
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigCoverageMalformedError(filePath, `attribute ${attribute}="${raw}" is not a number`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads the root `<coverage>` element of a Cobertura report. */
export function parseCoberturaXml(xml: string, filePath: string): CoverageData {
  let doc: unknown;
  try {
    doc = parser.parse(xml, true);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigCoverageMalformedError(filePath, detail);
  }
  const root = isRecord(doc) ? doc.coverage : undefined;
  if (!isRecord(root)) {
    throw new ConfigCoverageMalformedError(filePath, "missing <coverage> root element");
  }

  const linesCovered = toNumber(readAttribute(root, "lines-covered"), "lines-covered", filePath, true);
  const linesValid = toNumber(readAttribute(root, "lines-valid"), "lines-valid", filePath, true);
  let lineRate = toNumber(readAttribute(root, "line-rate"), "line-rate", filePath, false);

  if (lineRate === null) {
    if (linesCovered === null || linesValid === null || linesValid === 0) {
      throw new ConfigCoverageMalformedError(
        filePath,
        "missing line-rate and lines-covered/lines-valid attributes"
      );
    }
    lineRate = linesCovered / linesValid;
  }
  if (lineRate < 0 || lineRate > 1) {
    throw new ConfigCoverageMalformedError(filePath, `line-rate ${lineRate} is outside 0..1`);
  }

  return { lineRate, percent: lineRate * 100, linesCovered, linesValid };
}

export async function loadCoverage(filePath: string): Promise<CoverageData> {
  if (!existsSync(filePath)) {
    throw new ConfigCoverageMissingError(filePath);
  }
  const xml = await readFile(filePath, "utf-8");
  return parseCoberturaXml(xml, filePath);
}
