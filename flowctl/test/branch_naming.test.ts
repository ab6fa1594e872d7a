import { describe, expect, it } from "vitest";
import { classify, highestSequence, hotfixSuffix } from "../src/branch/naming.js";
import {
  completionTagName,
  completionTarget,
  formatTimestamp,
  hotfixTagName,
  releaseTagName,
  resolutionBranchName,
} from "../src/branch/artifacts.js";

describe("classify", () => {
  it("recognizes master", () => {
    expect(classify("master")).toEqual({ rawName: "master", kind: "master" });
  });

  it("parses development branches with their sequence id", () => {
    for (const [name, seq] of [["d1", 1], ["d7", 7], ["d42", 42], ["d007", 7]] as const) {
      const d = classify(name);
      expect(d.kind).toBe("development");
      expect(d.sequenceId).toBe(seq);
      expect(d.parentReleaseId).toBeUndefined();
    }
  });

  it("parses release branches with their sequence id", () => {
    expect(classify("r3")).toEqual({ rawName: "r3", kind: "release", sequenceId: 3 });
  });

  it("takes the parent release from the first r<N> token of a hotfix", () => {
    expect(classify("hotfix/r1-login-fix")).toEqual({ rawName: "hotfix/r1-login-fix", kind: "hotfix", parentReleaseId: 1 });
    expect(classify("hotfix/login-r12-fix").parentReleaseId).toBe(12);
    expect(classify("hotfix/r2-after-r3").parentReleaseId).toBe(2);
  });

  it("leaves the parent release unresolved when the hotfix names none", () => {
    const d = classify("hotfix/login-fix");
    expect(d.kind).toBe("hotfix");
    expect(d.parentReleaseId).toBeUndefined();
    expect(classify("hotfix/bar123").parentReleaseId).toBeUndefined();
  });

  it("only counts an r<N> token at a word start", () => {
    expect(classify("hotfix/bugr2").parentReleaseId).toBeUndefined();
    expect(classify("hotfix/bug_r2").parentReleaseId).toBe(2);
  });

  it("never sets a sequence id on hotfixes", () => {
    expect(classify("hotfix/r1-x").sequenceId).toBeUndefined();
  });

  it("classifies everything else as unknown", () => {
    for (const name of ["main", "Master", "D1", "d", "dx1", "d1a", "r", "r1.2", "release/r1", "hotfix/", "hotfix", "feature/d1", " d1"]) {
      expect(classify(name).kind).toBe("unknown");
    }
  });

  it("returns frozen descriptors", () => {
    expect(Object.isFrozen(classify("d1"))).toBe(true);
    expect(Object.isFrozen(classify("hotfix/r1-a"))).toBe(true);
  });
});

describe("hotfixSuffix / highestSequence", () => {
  it("strips the hotfix prefix", () => {
    expect(hotfixSuffix("hotfix/r1-login-fix")).toBe("r1-login-fix");
    expect(hotfixSuffix("d1")).toBe("d1");
  });

  it("picks the numerically highest sequence, not the lexically last", () => {
    const best = highestSequence(["r2", "r10", "r9"].map(classify));
    expect(best?.rawName).toBe("r10");
  });

  it("returns null for no candidates", () => {
    expect(highestSequence([])).toBeNull();
    expect(highestSequence([classify("master")])).toBeNull();
  });
});

describe("generated names", () => {
  const at = new Date("2026-03-04T05:06:07Z");

  it("formats timestamps as yyyyMMdd.HHmmss in UTC", () => {
    expect(formatTimestamp(at)).toBe("20260304.050607");
  });

  it("builds completion tag names, including for hotfixes", () => {
    expect(completionTagName("d1")).toBe("d1-complete");
    expect(completionTagName("hotfix/r1-login-fix")).toBe("hotfix/r1-login-fix-complete");
  });

  it("maps completion tags back to their branch", () => {
    expect(completionTarget("hotfix/r1-login-fix-complete")).toBe("hotfix/r1-login-fix");
    expect(completionTarget("release-r1-20260304.050607")).toBeNull();
    expect(completionTarget("-complete")).toBeNull();
  });

  it("builds release and hotfix ship tags", () => {
    expect(releaseTagName("r3", at)).toBe("release-r3-20260304.050607");
    expect(releaseTagName("r3", at)).toMatch(/^release-r3-\d{8}\.\d{6}$/);
    expect(hotfixTagName("hotfix/r1-login-fix", at)).toBe("hotfix-r1-login-fix-20260304.050607");
  });

  it("builds resolution branch names from the run id", () => {
    expect(resolutionBranchName("128")).toBe("merge-hotfix-to-dev-128");
  });
});
