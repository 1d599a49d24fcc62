import { describe, it, expect } from "vitest";
import { planArtifactPath } from "./plan-artifact-path";

describe("planArtifactPath", () => {
  it("keeps the base path for the first image", () => {
    expect(planArtifactPath("types.cs", 0)).toBe("types.cs");
    expect(planArtifactPath("out/dir", 0)).toBe("out/dir");
  });

  it("inserts the index before a recognized extension", () => {
    expect(planArtifactPath("types.cs", 1)).toBe("types-1.cs");
    expect(planArtifactPath("scripts/ida.py", 2)).toBe("scripts/ida-2.py");
    expect(planArtifactPath("Game.sln", 3)).toBe("Game-3.sln");
  });

  it("recognizes extensions case-insensitively", () => {
    expect(planArtifactPath("Types.CS", 1)).toBe("Types-1.CS");
  });

  it("appends the index when the extension is not recognized", () => {
    expect(planArtifactPath("typesNoExt", 1)).toBe("typesNoExt-1");
    expect(planArtifactPath("archive.tar", 1)).toBe("archive.tar-1");
    expect(planArtifactPath("out.dir/types", 1)).toBe("out.dir/types-1");
  });

  it("suffixes the last segment of a directory path with a trailing slash", () => {
    expect(planArtifactPath("out/", 1)).toBe("out-1");
  });

  it("accepts a custom extension list", () => {
    expect(planArtifactPath("notes.txt", 1, [".txt"])).toBe("notes-1.txt");
    expect(planArtifactPath("types.cs", 1, [".txt"])).toBe("types.cs-1");
  });

  it("gives every image a distinct path", () => {
    const planned = Array.from({ length: 12 }, (_, i) =>
      planArtifactPath("types.cs", i),
    );
    expect(new Set(planned).size).toBe(12);
  });

  it("keeps three images apart for any base path", () => {
    for (const base of ["types.cs", "out", "out/", "a.b.c", "ida.PY"]) {
      const planned = [0, 1, 2].map((i) => planArtifactPath(base, i));
      expect(new Set(planned).size).toBe(3);
    }
  });

  it("rejects negative and fractional indices", () => {
    expect(() => planArtifactPath("types.cs", -1)).toThrow(RangeError);
    expect(() => planArtifactPath("types.cs", 1.5)).toThrow(RangeError);
  });
});
