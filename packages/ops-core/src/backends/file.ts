import path from "node:path";
import { promises as fs } from "node:fs";
import type { OperationDescriptor } from "@softcenter/shared";
import type { BackendPlanner, OperationPlan, PlanDiagnostic } from "./types.js";
import { ARTIFACT_PLACEHOLDER, WORKDIR_PLACEHOLDER, unsupported } from "./types.js";

export type LocalFileFormat = "deb" | "rpm" | "pkg" | "flatpak";

export function detectFileFormat(target: string): LocalFileFormat | undefined {
  const name = path.basename(target).toLowerCase();
  if (name.endsWith(".deb")) {
    return "deb";
  }
  if (name.endsWith(".rpm")) {
    return "rpm";
  }
  if (/\.pkg\.tar(\.(zst|xz|gz|bz2))?$/.test(name)) {
    return "pkg";
  }
  if (name.endsWith(".flatpak") || name.endsWith(".flatpakref")) {
    return "flatpak";
  }
  return undefined;
}

export function createFileBackend(): BackendPlanner {
  return {
    source: "file",
    plan(descriptor) {
      const format = detectFileFormat(descriptor.target);
      if (!format) {
        throw unsupported(descriptor);
      }
      const file = path.resolve(descriptor.target);
      if (descriptor.kind === "convert") {
        return planConvert(descriptor, format, file);
      }
      if (descriptor.kind !== "install") {
        throw unsupported(descriptor);
      }
      switch (format) {
        case "deb":
          return {
            steps: [
              {
                label: "convert .deb with debtap",
                phase: "converting",
                candidates: [{
                  argv: ["debtap", "-Q", "-o", WORKDIR_PLACEHOLDER, file],
                  tools: ["debtap"],
                  elevation: "never"
                }]
              },
              {
                label: "install converted package",
                phase: "installing",
                candidates: [{
                  argv: ["pacman", "-U", "--noconfirm", ARTIFACT_PLACEHOLDER],
                  tools: ["pacman"],
                  elevation: "prefix"
                }]
              }
            ]
          };
        case "rpm":
          return {
            steps: [
              {
                label: "extract .rpm",
                phase: "extracting",
                candidates: [
                  { argv: ["rpmextract.sh", file], tools: ["rpmextract"], elevation: "never" },
                  { argv: ["bsdtar", "-xf", file, "-C", WORKDIR_PLACEHOLDER], tools: ["bsdtar"], elevation: "never" }
                ]
              },
              {
                label: "copy extracted tree to /",
                phase: "installing",
                candidates: [{
                  argv: ["cp", "-r", "--no-preserve=ownership", `${WORKDIR_PLACEHOLDER}/.`, "/"],
                  tools: [],
                  elevation: "prefix"
                }]
              }
            ]
          };
        case "pkg":
          return {
            steps: [{
              label: "install local package",
              phase: "installing",
              candidates: [{
                argv: ["pacman", "-U", "--noconfirm", file],
                tools: ["pacman"],
                elevation: "prefix"
              }]
            }]
          };
        case "flatpak":
          return {
            steps: [{
              label: "install flatpak bundle",
              phase: "installing",
              candidates: [{
                argv: ["flatpak", "install", "--user", "-y", "--noninteractive", file],
                tools: ["flatpak"],
                elevation: "never"
              }]
            }]
          };
      }
    },
    async preflight(descriptor): Promise<PlanDiagnostic[]> {
      const file = path.resolve(descriptor.target);
      try {
        const stats = await fs.stat(file);
        if (stats.isFile()) {
          return [];
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return [notFound(file, message)];
      }
      return [notFound(file, "not a regular file")];
    }
  };
}

function planConvert(
  descriptor: OperationDescriptor,
  format: LocalFileFormat,
  file: string
): OperationPlan {
  const outputDir = path.resolve(descriptor.options?.destination ?? path.dirname(file));
  switch (format) {
    case "deb":
      return {
        steps: [{
          label: "convert .deb with debtap",
          phase: "converting",
          candidates: [{
            argv: ["debtap", "-Q", "-o", outputDir, file],
            tools: ["debtap"],
            elevation: "never"
          }]
        }]
      };
    case "rpm":
      return {
        steps: [{
          label: "extract .rpm",
          phase: "extracting",
          candidates: [
            { argv: ["rpmextract.sh", file], tools: ["rpmextract"], elevation: "never", cwd: outputDir },
            { argv: ["bsdtar", "-xf", file, "-C", outputDir], tools: ["bsdtar"], elevation: "never", cwd: outputDir }
          ]
        }]
      };
    default:
      throw unsupported(descriptor);
  }
}

function notFound(file: string, detail: string): PlanDiagnostic {
  return {
    code: "file.not_found",
    message: `local package not readable: ${file} (${detail})`,
    severity: "error",
    recoverable: false
  };
}
