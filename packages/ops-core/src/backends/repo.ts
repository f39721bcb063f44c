import type { BackendPlanner } from "./types.js";
import { phaseForKind, singleStep, splitTargets, unsupported } from "./types.js";

export function createRepoBackend(): BackendPlanner {
  return {
    source: "repo",
    plan(descriptor) {
      const targets = splitTargets(descriptor.target);
      const phase = phaseForKind(descriptor.kind);
      switch (descriptor.kind) {
        case "install":
          return singleStep("pacman install", phase, {
            argv: ["pacman", "-S", "--noconfirm", "--needed", ...targets],
            tools: ["pacman"],
            elevation: "prefix"
          });
        case "remove":
          return singleStep("pacman remove", phase, {
            argv: ["pacman", "-Rns", "--noconfirm", ...targets],
            tools: ["pacman"],
            elevation: "prefix"
          });
        case "update":
          return singleStep("system upgrade", phase, {
            argv: ["pacman", "-Syu", "--noconfirm"],
            tools: ["pacman"],
            elevation: "prefix"
          });
        case "search":
          return singleStep("repository search", phase, {
            argv: ["pacman", "-Ss", ...targets],
            tools: ["pacman"],
            elevation: "never"
          });
        case "list":
          return singleStep("installed packages", phase, {
            argv: ["pacman", "-Q", ...targets],
            tools: ["pacman"],
            elevation: "never"
          });
        default:
          throw unsupported(descriptor);
      }
    }
  };
}
