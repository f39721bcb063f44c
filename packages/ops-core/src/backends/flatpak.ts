import type { BackendPlanner, CommandCandidate } from "./types.js";
import { phaseForKind, singleStep, splitTargets, unsupported } from "./types.js";

export const FLATHUB_REMOTE = "flathub";
export const DEFAULT_INSTALLATION = "system";

// The default installation takes no flag; custom ones come from /etc/flatpak/installations.d.
export function installationArgs(installation: string | undefined): string[] {
  if (!installation || installation === DEFAULT_INSTALLATION) {
    return [];
  }
  if (installation === "user") {
    return ["--user"];
  }
  return ["--installation", installation];
}

function flatpak(args: string[]): CommandCandidate {
  return { argv: ["flatpak", ...args], tools: ["flatpak"], elevation: "never" };
}

export function createFlatpakBackend(): BackendPlanner {
  return {
    source: "flatpak",
    plan(descriptor) {
      const targets = splitTargets(descriptor.target);
      const phase = phaseForKind(descriptor.kind);
      const { destination, origin } = descriptor.options ?? {};
      switch (descriptor.kind) {
        case "install":
          return singleStep("flatpak install", phase, flatpak([
            ...installationArgs(destination),
            "install",
            "-y",
            "--noninteractive",
            FLATHUB_REMOTE,
            ...targets
          ]));
        case "remove":
          return singleStep("flatpak uninstall", phase, flatpak([
            ...installationArgs(origin),
            "uninstall",
            "-y",
            "--noninteractive",
            ...targets
          ]));
        case "update":
          return singleStep("flatpak update", phase, flatpak([
            ...installationArgs(origin),
            "update",
            "-y",
            "--noninteractive",
            ...targets
          ]));
        case "move":
          if (destination === (origin ?? DEFAULT_INSTALLATION)) {
            throw unsupported(descriptor);
          }
          return {
            steps: [
              {
                label: `install into ${destination}`,
                phase: "installing",
                candidates: [flatpak([
                  ...installationArgs(destination),
                  "install",
                  "-y",
                  "--noninteractive",
                  FLATHUB_REMOTE,
                  ...targets
                ])]
              },
              {
                label: `uninstall from ${origin ?? DEFAULT_INSTALLATION}`,
                phase: "removing",
                candidates: [flatpak([
                  ...installationArgs(origin),
                  "uninstall",
                  "-y",
                  "--noninteractive",
                  ...targets
                ])]
              }
            ]
          };
        case "search":
          return singleStep("flatpak search", phase, flatpak(["search", ...targets]));
        case "list":
          return singleStep("flatpak apps", phase, flatpak([
            ...installationArgs(origin),
            "list",
            "--app",
            "--columns=application,version,installation"
          ]));
        default:
          throw unsupported(descriptor);
      }
    }
  };
}
