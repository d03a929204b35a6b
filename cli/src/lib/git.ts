import fs from "node:fs";
import path from "node:path";
import { simpleGit } from "simple-git";
import { getCacheDir, getGitHubToken } from "./config.js";
import { GitError, NotFoundError, formatError } from "./errors.js";
import { logger } from "./logger.js";

/** What the installer needs from git: clone, pull, tags. */
export interface GitTransport {
  clone(url: string, ref?: string): Promise<string>;
  pull(localPath: string): Promise<boolean>;
  listTags(url: string): Promise<string[]>;
}

const GIT_URL_REGEX = /^(https?:\/\/|ssh:\/\/|git:\/\/|git@|file:\/\/)/;
const SHORTHAND_REGEX = /^github\.com\/[^/\s]+\/[^/\s]+$/;

export function isGitUrl(source: string): boolean {
  return GIT_URL_REGEX.test(source) || SHORTHAND_REGEX.test(source);
}

export function repoCloneUrl(repoUrl: string, token: string | undefined = getGitHubToken()): string {
  const shorthand = repoUrl.match(/^github\.com\/(.+?)(\.git)?$/);
  const https = repoUrl.match(/^https:\/\/github\.com\/(.+?)(\.git)?$/);
  const repo = shorthand?.[1] ?? https?.[1];
  if (repo === undefined) return repoUrl;
  if (token) {
    return `https://${token}@github.com/${repo}.git`;
  }
  return `https://github.com/${repo}.git`;
}

/** `https://github.com/acme/tools.git` → `github.com-acme-tools` */
export function cacheKeyFor(repoUrl: string): string {
  return repoUrl
    .replace(/^[a-z]+:\/\//, "")
    .replace(/^git@/, "")
    .replace(/\.git$/, "")
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function parseTagRefs(output: string): string[] {
  const tags: string[] = [];
  for (const line of output.split("\n")) {
    const match = line.trim().match(/refs\/tags\/(.+?)(\^\{\})?$/);
    if (match?.[1] && !tags.includes(match[1])) tags.push(match[1]);
  }
  return tags;
}

export class SimpleGitTransport implements GitTransport {
  private readonly cacheDir: string;

  constructor(cacheDir: string = getCacheDir()) {
    this.cacheDir = cacheDir;
  }

  async clone(url: string, ref?: string): Promise<string> {
    const target = path.join(this.cacheDir, cacheKeyFor(url));
    try {
      if (fs.existsSync(path.join(target, ".git"))) {
        logger.debug(`Using cached clone ${target}`);
        const git = simpleGit(target);
        await git.fetch(["--tags", "--force"]);
        if (ref) {
          await git.checkout(ref);
        } else {
          await this.pull(target);
        }
        return target;
      }

      fs.mkdirSync(this.cacheDir, { recursive: true });
      logger.debug(`Cloning ${url} into ${target}`);
      await simpleGit().clone(repoCloneUrl(url), target);
      if (ref) {
        await simpleGit(target).checkout(ref);
      }
      return target;
    } catch (err) {
      if (err instanceof GitError) throw err;
      throw new GitError(`Failed to clone ${url}${ref ? `@${ref}` : ""}: ${formatError(err)}`);
    }
  }

  async pull(localPath: string): Promise<boolean> {
    try {
      const git = simpleGit(localPath);
      const before = await git.revparse(["HEAD"]);
      await git.pull();
      const after = await git.revparse(["HEAD"]);
      return before.trim() !== after.trim();
    } catch (err) {
      throw new GitError(`Failed to pull ${localPath}: ${formatError(err)}`);
    }
  }

  async listTags(url: string): Promise<string[]> {
    try {
      const output = await simpleGit().listRemote(["--tags", repoCloneUrl(url)]);
      return parseTagRefs(output);
    } catch (err) {
      throw new GitError(`Failed to list tags for ${url}: ${formatError(err)}`);
    }
  }
}

export interface ResolvedSource {
  /** Local directory containing the manifest. */
  root: string;
  /** Set when the package came from git. */
  repository?: string;
}

/** A local directory is used in place; anything that looks like a git URL is cloned. */
export async function resolvePackageSource(
  source: string,
  transport: GitTransport,
  ref?: string,
): Promise<ResolvedSource> {
  const local = path.resolve(source);
  if (fs.existsSync(local) && fs.statSync(local).isDirectory()) {
    return { root: local };
  }
  if (!isGitUrl(source)) {
    throw new NotFoundError(`Package source not found: ${source}`);
  }
  const root = await transport.clone(source, ref);
  return { root, repository: source };
}
