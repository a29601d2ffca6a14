import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { ProviderKind, ProviderRootsConfig } from "@threadwatch/contracts";
import { expandHome } from "./utils.js";

export interface DiscoveredTranscriptFile {
  path: string;
  provider: ProviderKind;
  root: string;
  relativePath: string;
  project: string;
  /** Session key derived from the file location. */
  fileSessionKey: string;
  sizeBytes: number;
  mtimeMs: number;
}

interface ProviderLayout {
  provider: ProviderKind;
  root: string;
  globs: string[];
  deep: number;
}

export function resolveProviderRoots(roots: ProviderRootsConfig): Record<ProviderKind, string> {
  return {
    codex: path.resolve(expandHome(roots.codexDir)),
    claude: path.resolve(expandHome(roots.claudeDir)),
  };
}

function providerLayouts(roots: ProviderRootsConfig): ProviderLayout[] {
  const resolved = resolveProviderRoots(roots);
  return [
    { provider: "codex", root: resolved.codex, globs: ["sessions/**/*.jsonl"], deep: 12 },
    { provider: "claude", root: resolved.claude, globs: ["*/*.jsonl"], deep: 2 },
  ];
}

export function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function fileSessionKeyFor(provider: ProviderKind, relativePath: string): string {
  const stem = fileStem(relativePath);
  if (provider === "claude") {
    return `claude:${projectFor(provider, relativePath)}:${stem}`;
  }
  return stem;
}

export function projectFor(provider: ProviderKind, relativePath: string): string {
  if (provider !== "claude") return "";
  const [project] = relativePath.split(/[\\/]/);
  return project ?? "";
}

export function toPosixRelative(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

export async function discoverTranscriptFiles(roots: ProviderRootsConfig): Promise<DiscoveredTranscriptFile[]> {
  const files: DiscoveredTranscriptFile[] = [];
  for (const layout of providerLayouts(roots)) {
    const matches = await fg(layout.globs, {
      cwd: layout.root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      deep: layout.deep,
      suppressErrors: true,
      unique: true,
      followSymbolicLinks: false,
    });

    for (const filePath of matches) {
      try {
        const fileStat = await stat(filePath);
        const resolved = path.resolve(filePath);
        const relativePath = toPosixRelative(layout.root, resolved);
        files.push({
          path: resolved,
          provider: layout.provider,
          root: layout.root,
          relativePath,
          project: projectFor(layout.provider, relativePath),
          fileSessionKey: fileSessionKeyFor(layout.provider, relativePath),
          sizeBytes: fileStat.size,
          mtimeMs: fileStat.mtimeMs,
        });
      } catch {
        // ignore stale files
      }
    }
  }

  files.sort((a, b) => a.path.localeCompare(b.path));
  return files;
}
