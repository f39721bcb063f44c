import { describe, expect, it } from "vitest";
import {
  createOperationDescriptor,
  defaultRequiresPrivilege,
  describeOperation,
  DescriptorError,
  isExclusiveDescriptor,
  parseOperationKind
} from "../src/operation.js";

function expectDescriptorError(fn: () => unknown, code: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(DescriptorError);
    expect(error instanceof DescriptorError ? error.code : undefined).toBe(code);
    return;
  }
  throw new Error(`expected DescriptorError ${code}`);
}

describe("createOperationDescriptor", () => {
  it("normalizes kind, source and target", () => {
    const descriptor = createOperationDescriptor({ kind: " Install ", source: "REPO", target: "  firefox " });
    expect(descriptor).toEqual({
      kind: "install",
      source: "repo",
      target: "firefox",
      requiresPrivilege: true
    });
    expect(Object.isFrozen(descriptor)).toBe(true);
  });

  it("accepts dashed kind names", () => {
    expect(parseOperationKind("diagnostic-fix")).toBe("diagnostic_fix");
  });

  it("rejects unknown kinds and sources", () => {
    expectDescriptorError(() => createOperationDescriptor({ kind: "reinstall", source: "repo", target: "x" }), "invalid_kind");
    expectDescriptorError(() => createOperationDescriptor({ kind: "install", source: "brew", target: "x" }), "invalid_source");
  });

  it("requires a target except for list and update", () => {
    expectDescriptorError(() => createOperationDescriptor({ kind: "install", source: "repo", target: "  " }), "empty_target");
    expect(createOperationDescriptor({ kind: "update", source: "repo", target: "" }).target).toBe("");
    expect(createOperationDescriptor({ kind: "list", source: "flatpak", target: "" }).target).toBe("");
  });

  it("limits convert to files and move to flatpak", () => {
    expectDescriptorError(
      () => createOperationDescriptor({ kind: "convert", source: "repo", target: "pkg" }),
      "unsupported_combination"
    );
    expectDescriptorError(
      () => createOperationDescriptor({ kind: "move", source: "repo", target: "pkg", options: { destination: "user" } }),
      "unsupported_combination"
    );
    expectDescriptorError(
      () => createOperationDescriptor({ kind: "move", source: "flatpak", target: "org.example.App" }),
      "unsupported_combination"
    );
  });

  it("requires argv for diagnostic fixes", () => {
    expectDescriptorError(
      () => createOperationDescriptor({ kind: "diagnostic_fix", source: "repo", target: "keyring", options: { argv: [" "] } }),
      "missing_argv"
    );
    const fix = createOperationDescriptor({
      kind: "diagnostic_fix",
      source: "repo",
      target: "keyring",
      options: { argv: ["pacman-key", " --init "] }
    });
    expect(fix.options?.argv).toEqual(["pacman-key", "--init"]);
    expect(fix.requiresPrivilege).toBe(true);
  });

  it("never lets a diagnostic fix run unprivileged", () => {
    expectDescriptorError(
      () => createOperationDescriptor({
        kind: "diagnostic_fix",
        source: "repo",
        target: "x",
        requiresPrivilege: false,
        options: { argv: ["sh", "-c", "id"] }
      }),
      "fix_requires_privilege"
    );
  });

  it("refuses privilege on read-only kinds", () => {
    expectDescriptorError(
      () => createOperationDescriptor({ kind: "search", source: "repo", target: "vim", requiresPrivilege: true }),
      "read_only_privilege"
    );
  });

  it("drops empty options", () => {
    const descriptor = createOperationDescriptor({
      kind: "install",
      source: "flatpak",
      target: "org.example.App",
      options: { destination: " ", label: "" }
    });
    expect(descriptor.options).toBeUndefined();
  });
});

describe("privilege and exclusivity", () => {
  it("defaults privilege by source", () => {
    expect(defaultRequiresPrivilege("install", "repo")).toBe(true);
    expect(defaultRequiresPrivilege("install", "aur")).toBe(true);
    expect(defaultRequiresPrivilege("install", "flatpak")).toBe(false);
    expect(defaultRequiresPrivilege("search", "repo")).toBe(false);
    expect(defaultRequiresPrivilege("diagnostic_fix", "flatpak")).toBe(true);
  });

  it("serializes privileged and package-database mutations only", () => {
    const repoInstall = createOperationDescriptor({ kind: "install", source: "repo", target: "vim" });
    const aurUnprivileged = createOperationDescriptor({
      kind: "install",
      source: "aur",
      target: "yay-bin",
      requiresPrivilege: false
    });
    const flatpakInstall = createOperationDescriptor({ kind: "install", source: "flatpak", target: "org.example.App" });
    const search = createOperationDescriptor({ kind: "search", source: "repo", target: "vim" });
    expect(isExclusiveDescriptor(repoInstall)).toBe(true);
    expect(isExclusiveDescriptor(aurUnprivileged)).toBe(true);
    expect(isExclusiveDescriptor(flatpakInstall)).toBe(false);
    expect(isExclusiveDescriptor(search)).toBe(false);
  });
});

describe("describeOperation", () => {
  it("prefers the label", () => {
    const descriptor = createOperationDescriptor({
      kind: "install",
      source: "repo",
      target: "vim",
      options: { label: "Install Vim" }
    });
    expect(describeOperation(descriptor)).toBe("Install Vim");
  });

  it("falls back to kind, source and target", () => {
    expect(describeOperation(createOperationDescriptor({ kind: "remove", source: "aur", target: "foo" })))
      .toBe("remove aur:foo");
    expect(describeOperation(createOperationDescriptor({ kind: "update", source: "repo", target: "" })))
      .toBe("update repo:*");
  });
});
