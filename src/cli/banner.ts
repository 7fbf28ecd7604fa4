type BannerOptions = {
  argv?: string[];
  columns?: number;
  isTty?: boolean;
  write?: (text: string) => void;
};

const TITLE = "scan-tagger";
const TAGLINE = "catalog metadata for your film scans";

let bannerEmitted = false;

const hasVersionFlag = (argv: string[]) =>
  argv.some((arg) => arg === "--version" || arg === "-V");

const hasHelpFlag = (argv: string[]) => argv.some((arg) => arg === "--help" || arg === "-h");

export function formatCliBannerLine(version: string, options: BannerOptions = {}): string {
  const columns = options.columns ?? process.stdout.columns ?? 120;
  const fullLine = `${TITLE} ${version} - ${TAGLINE}`;
  if (fullLine.length <= columns) {
    return fullLine;
  }
  return `${TITLE} ${version}\n  ${TAGLINE}`;
}

export function emitCliBanner(version: string, options: BannerOptions = {}) {
  if (bannerEmitted) {
    return;
  }
  const argv = options.argv ?? process.argv;
  if (!(options.isTty ?? process.stdout.isTTY)) {
    return;
  }
  if (hasVersionFlag(argv) || hasHelpFlag(argv)) {
    return;
  }
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  write(`\n${formatCliBannerLine(version, options)}\n\n`);
  bannerEmitted = true;
}

export function hasEmittedCliBanner(): boolean {
  return bannerEmitted;
}
