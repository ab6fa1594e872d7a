import { describe, expect, it } from "vitest";
import { classify } from "../src/branch/naming.js";
import {
  afterHotfixMerged,
  isGated,
  primaryAction,
  promotesTo,
  releaseFor,
  selectAction,
} from "../src/core/state-machine.js";

describe("state-machine", () => {
  it("gates development, release and hotfix only", () => {
    expect(isGated("development")).toBe(true);
    expect(isGated("release")).toBe(true);
    expect(isGated("hotfix")).toBe(true);
    expect(isGated("master")).toBe(false);
    expect(isGated("unknown")).toBe(false);
  });

  it("promotes d → r → master, hotfix → release", () => {
    expect(promotesTo("development")).toBe("release");
    expect(promotesTo("release")).toBe("master");
    expect(promotesTo("hotfix")).toBe("release");
    expect(promotesTo("master")).toBeNull();
    expect(promotesTo("unknown")).toBeNull();
  });

  it("selects CreateRelease for a complete development branch", () => {
    expect(selectAction(classify("d7"), true)).toEqual({ type: "create_release", fromDev: "d7", releaseId: 7 });
  });

  it("selects MergeToMaster for a complete release branch", () => {
    expect(selectAction(classify("r3"), true)).toEqual({ type: "merge_to_master", fromBranch: "r3" });
  });

  it("selects PropagateHotfix with the resolved parent release", () => {
    expect(selectAction(classify("hotfix/login"), true, "r2")).toEqual({
      type: "propagate_hotfix",
      hotfixBranch: "hotfix/login",
      parentRelease: "r2",
    });
  });

  it("selects noop when the gate is closed", () => {
    expect(selectAction(classify("d7"), false).type).toBe("noop");
    expect(selectAction(classify("r3"), false).type).toBe("noop");
    expect(selectAction(classify("hotfix/r1-x"), false, "r1").type).toBe("noop");
  });

  it("selects noop for master and unknown branches", () => {
    expect(selectAction(classify("master"), true)).toEqual({ type: "noop", reason: "master is the end of the promotion flow" });
    expect(selectAction(classify("feature/x"), true)).toEqual({ type: "noop", reason: "'feature/x' matches no branch grammar" });
  });

  it("names the primary action of each kind", () => {
    expect(primaryAction("development")).toBe("create_release");
    expect(primaryAction("release")).toBe("merge_to_master");
    expect(primaryAction("hotfix")).toBe("propagate_hotfix");
    expect(primaryAction("master")).toBe("noop");
  });

  it("ships a hotfixed release only when the release is already complete", () => {
    expect(afterHotfixMerged("r1", true)).toEqual({ type: "merge_to_master", fromBranch: "r1" });
    expect(afterHotfixMerged("r1", false)).toEqual({ type: "await_release_completion", parentRelease: "r1" });
  });

  it("maps development branches to their release branch", () => {
    expect(releaseFor(classify("d7"))).toBe("r7");
    expect(releaseFor(classify("r7"))).toBeNull();
  });
});
