import type { BackendPlanner, CommandCandidate } from "./types.js";
import { phaseForKind, singleStep, splitTargets, unsupported } from "./types.js";

/** paru first, yay second; both refuse to run as root and take --sudo instead. */
export function aurHelperCandidates(
  paruArgs: readonly string[],
  yayArgs: readonly string[] = paruArgs,
  elevation: CommandCandidate["elevation"] = "helper"
): CommandCandidate[] {
  return [
    { argv: ["paru", ...paruArgs], tools: ["paru"], elevation },
    { argv: ["yay", ...yayArgs], tools: ["yay"], elevation }
  ];
}

export function createAurBackend(): BackendPlanner {
  return {
    source: "aur",
    plan(descriptor) {
      const targets = splitTargets(descriptor.target);
      const phase = phaseForKind(descriptor.kind);
      switch (descriptor.kind) {
        case "install":
          return {
            steps: [{
              label: "AUR build and install",
              phase: "building",
              candidates: aurHelperCandidates(
                ["-S", "--noconfirm", "--skipreview", ...targets],
                ["-S", "--noconfirm", "--answerdiff", "None", "--answerclean", "None", ...targets]
              )
            }]
          };
        case "remove":
          return singleStep("pacman remove", phase, {
            argv: ["pacman", "-Rns", "--noconfirm", ...targets],
            tools: ["pacman"],
            elevation: "prefix"
          });
        case "update":
          return {
            steps: [{
              label: "AUR upgrade",
              phase,
              candidates: aurHelperCandidates(["-Sua", "--noconfirm", "--skipreview"], ["-Sua", "--noconfirm"])
            }]
          };
        case "search":
          return {
            steps: [{
              label: "AUR search",
              phase,
              candidates: aurHelperCandidates(["-Ss", "--aur", ...targets], undefined, "never")
            }]
          };
        case "list":
          return singleStep("foreign packages", phase, {
            argv: ["pacman", "-Qm", ...targets],
            tools: ["pacman"],
            elevation: "never"
          });
        default:
          throw unsupported(descriptor);
      }
    }
  };
}
