const RESET = "\x1b[0m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const MAGENTA = "\x1b[35m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";

function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

let capturing = false;
let captured: string[] = [];
let verbose = Boolean(process.env["INSTRUCTIONKIT_DEBUG"]);

function emit(plain: string, colored: string, stream: "out" | "err" = "out"): void {
  if (capturing) {
    captured.push(stripAnsi(plain));
  } else if (stream === "err") {
    console.error(colored);
  } else {
    console.log(colored);
  }
}

export const logger = {
  capture() {
    capturing = true;
    captured = [];
  },

  flush(): string[] {
    const messages = captured;
    captured = [];
    capturing = false;
    return messages;
  },

  isCapturing(): boolean {
    return capturing;
  },

  setVerbose(enabled: boolean) {
    verbose = enabled;
  },

  isVerbose(): boolean {
    return verbose;
  },

  info(msg: string) {
    emit(`info ${msg}`, `${CYAN}info${RESET} ${msg}`);
  },

  success(msg: string) {
    emit(`✓ ${msg}`, `${GREEN}✓${RESET} ${msg}`);
  },

  warn(msg: string) {
    emit(`warn ${msg}`, `${YELLOW}warn${RESET} ${msg}`);
  },

  error(msg: string) {
    emit(`error ${msg}`, `${RED}error${RESET} ${msg}`, "err");
  },

  debug(msg: string) {
    if (!verbose) return;
    emit(`debug ${msg}`, `${MAGENTA}debug${RESET} ${DIM}${msg}${RESET}`, "err");
  },

  dim(msg: string) {
    emit(msg, `${DIM}${msg}${RESET}`);
  },

  bold(msg: string) {
    emit(msg, `${BOLD}${msg}${RESET}`);
  },

  table(headers: string[], rows: string[][]) {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    );

    const header = headers
      .map((h, i) => h.toUpperCase().padEnd(colWidths[i] ?? 0))
      .join("  ");

    emit(`  ${header}`, `  ${DIM}${header}${RESET}`);
    for (const row of rows) {
      const line = row.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join("  ");
      emit(`  ${line}`, `  ${line}`);
    }
  },

  blank() {
    emit("", "");
  },
};
