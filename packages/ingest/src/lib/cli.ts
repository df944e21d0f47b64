import type { PipelineConfig } from "./pipeline";
import type { Domain, PipelinePhase } from "./types";

const DOMAIN_FLAGS: Record<string, Domain> = {
  "--books": "books",
  "--quotes": "quotes",
  "--librairies": "librairies",
};

const PHASE_FLAGS: Record<string, PipelinePhase> = {
  "--extract-only": "extract",
  "--transform-only": "transform",
  "--load-only": "load",
};

const readPositiveInt = (flag: string, raw: string) => {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${raw}"`);
  }
  return parsed;
};

/**
 * Maps command-line flags onto config overrides. Domain flags select domains;
 * with none given, the environment decides.
 */
export const parseCliArgs = (argv: string[]): Partial<PipelineConfig> => {
  const overrides: Partial<PipelineConfig> = {};
  const domains: Domain[] = [];

  for (const arg of argv) {
    const [flag, value] = arg.includes("=")
      ? [arg.slice(0, arg.indexOf("=")), arg.slice(arg.indexOf("=") + 1)]
      : [arg, ""];
    const domain = DOMAIN_FLAGS[flag];
    if (domain) {
      if (!domains.includes(domain)) {
        domains.push(domain);
      }
      continue;
    }
    const phase = PHASE_FLAGS[flag];
    if (phase) {
      if (overrides.phase && overrides.phase !== phase) {
        throw new Error(`Choose one of ${Object.keys(PHASE_FLAGS).join(", ")}`);
      }
      overrides.phase = phase;
      continue;
    }
    switch (flag) {
      case "--analytics":
        overrides.analytics = true;
        break;
      case "--images":
        overrides.downloadImages = true;
        break;
      case "--backup":
        overrides.backup = true;
        break;
      case "--file":
        if (!value) {
          throw new Error("--file expects a path");
        }
        overrides.librairiesFile = value;
        break;
      case "--max-pages":
        overrides.maxPages = readPositiveInt(flag, value);
        break;
      case "--limit-categories":
        overrides.limitCategories = readPositiveInt(flag, value);
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (domains.length) {
    overrides.domains = domains;
  }
  return overrides;
};
