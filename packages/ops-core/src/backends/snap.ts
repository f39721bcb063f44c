import type { BackendPlanner } from "./types.js";
import { phaseForKind, singleStep, splitTargets, unsupported } from "./types.js";

export function createSnapBackend(): BackendPlanner {
  return {
    source: "snap",
    plan(descriptor) {
      const targets = splitTargets(descriptor.target);
      const phase = phaseForKind(descriptor.kind);
      switch (descriptor.kind) {
        case "install":
          return singleStep("snap install", phase, {
            argv: ["snap", "install", ...targets],
            tools: ["snap"],
            elevation: "prefix"
          });
        case "remove":
          return singleStep("snap remove", phase, {
            argv: ["snap", "remove", ...targets],
            tools: ["snap"],
            elevation: "prefix"
          });
        case "update":
          return singleStep("snap refresh", phase, {
            argv: ["snap", "refresh", ...targets],
            tools: ["snap"],
            elevation: "prefix"
          });
        case "search":
          return singleStep("snap search", phase, {
            argv: ["snap", "find", ...targets],
            tools: ["snap"],
            elevation: "never"
          });
        case "list":
          return singleStep("installed snaps", phase, {
            argv: ["snap", "list", ...targets],
            tools: ["snap"],
            elevation: "never"
          });
        default:
          throw unsupported(descriptor);
      }
    }
  };
}
