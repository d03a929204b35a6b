import * as p from "@clack/prompts";
import type { CredentialDescriptor } from "../types/index.js";
import type {
  BinaryConflictChoice,
  ConflictInfo,
  ConflictPrompter,
  FileSummary,
  TextConflictChoice,
} from "./conflict.js";
import type { CredentialPrompter, CredentialPromptResult } from "./credentials.js";

/**
 * Returns true if the CLI is running in an interactive terminal.
 * False when piped, in CI, or when --no-input is set.
 */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY) && !process.env["CI"];
}

/**
 * Wraps a clack prompt result. If the user cancels (Ctrl+C),
 * prints a cancel message and exits cleanly.
 */
export function handleCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return value;
}

/**
 * Wraps an async operation with a clack spinner.
 * Only shows spinner when interactive.
 */
export async function withSpinner<T>(
  message: string,
  fn: () => Promise<T>,
  successMessage?: string,
): Promise<T> {
  if (!isInteractive()) {
    return fn();
  }

  const s = p.spinner();
  s.start(message);
  try {
    const result = await fn();
    s.stop(successMessage ?? message);
    return result;
  } catch (err) {
    s.stop(`Failed: ${message}`);
    throw err;
  }
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

function describeFile(label: string, file: FileSummary): string {
  const modified = file.modifiedAt ? file.modifiedAt.toISOString() : "-";
  return `${label.padEnd(9)} ${formatBytes(file.sizeBytes).padEnd(10)} ${modified.padEnd(24)} ${file.checksum.slice(0, 19)}`;
}

export function conflictSummary(conflict: ConflictInfo): string {
  return [
    describeFile("existing", conflict.existing),
    describeFile("incoming", conflict.incoming),
  ].join("\n");
}

/**
 * Clack implementation of every interactive decision the installer asks for.
 * Cancelling a credential prompt is reported back instead of exiting.
 */
export class ClackPrompter implements CredentialPrompter, ConflictPrompter {
  async promptFor(descriptor: CredentialDescriptor, serverName: string): Promise<CredentialPromptResult> {
    const hint = descriptor.example ? ` (e.g. ${descriptor.example})` : "";
    const value = await p.password({
      message: `${serverName}: ${descriptor.name} - ${descriptor.description}${hint}`,
      validate(input) {
        if (descriptor.required && !input) return `${descriptor.name} is required`;
      },
    });
    if (p.isCancel(value)) {
      p.log.warn(`Skipped ${descriptor.name}; run "instructionkit mcp sync" later to finish ${serverName}`);
      return { ok: false, reason: "cancelled" };
    }
    return { ok: true, value };
  }

  async chooseText(conflict: ConflictInfo): Promise<TextConflictChoice> {
    p.note(conflictSummary(conflict), `${conflict.relativePath} has local changes`);
    const choice = await p.select({
      message: `What should happen to ${conflict.relativePath}?`,
      options: [
        { value: "keep", label: "Keep my version" },
        { value: "overwrite", label: "Overwrite", hint: "a backup is kept" },
        { value: "rename", label: "Install next to it", hint: "as name-N" },
      ],
      initialValue: "keep",
    });
    if (choice === "overwrite" || choice === "rename") return choice;
    return "keep";
  }

  async chooseBinary(conflict: ConflictInfo): Promise<BinaryConflictChoice> {
    p.note(conflictSummary(conflict), `${conflict.relativePath} differs (binary)`);
    const choice = await p.select({
      message: `Install the new ${conflict.relativePath}?`,
      options: [
        { value: "keep", label: "Keep existing file" },
        { value: "accept_new", label: "Accept new", hint: "written with a timestamp suffix" },
      ],
      initialValue: "keep",
    });
    return choice === "accept_new" ? "accept_new" : "keep";
  }

  async confirmSecret(name: string, value: string): Promise<boolean> {
    const preview = value.length > 8 ? `${value.slice(0, 4)}...` : value;
    const answer = await p.confirm({
      message: `${name}=${preview} might be a secret. Replace it with \${${name}}?`,
      initialValue: true,
    });
    return handleCancel(answer);
  }
}
