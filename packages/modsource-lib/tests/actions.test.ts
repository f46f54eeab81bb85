import { InvalidModuleSourceError } from "../src/lib/errors";
import { backendLogger } from "../src/lib/logger";
import { parseSource } from "../src/lib/module-source";
import { logError } from "../src/lib/utils";
import {
  formatModuleSource,
  validateModuleSource,
} from "../src/models";
import { parseSources, tryParseSource, vendorPathFor } from "../src/actions";

jest.mock("../src/lib/logger", () => ({
  backendLogger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

describe("source actions", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("tryParseSource", () => {
    it("wraps a parsed source", () => {
      expect(tryParseSource("github.com/org/repo?ref=v1")).toEqual({
        data: {
          raw: "github.com/org/repo?ref=v1",
          url: "https://github.com/org/repo.git",
          path: "github.com/org/repo",
          subdir: "",
          ref: "v1",
        },
      });
    });

    it("returns the error message and logs the rejection", () => {
      expect(tryParseSource("./local")).toEqual({
        error: 'unsupported module source: "./local" is not a Git or GitHub source',
      });
      expect(backendLogger.debug).toHaveBeenCalledWith(
        'Rejected module source "./local"',
        { meta: { kind: "unsupported module source" } },
      );
    });
  });

  describe("parseSources", () => {
    it("keeps input order", () => {
      const result = parseSources([
        "github.com/org/a",
        "git@github.com:org/b.git",
      ]);
      if ("error" in result) {
        throw new Error(result.error);
      }
      expect(result.data.map((source) => source.path)).toEqual([
        "github.com/org/a",
        "github.com/org/b",
      ]);
    });

    it("stops at the first failure", () => {
      expect(
        parseSources(["github.com/org/a", "git::https://example.com", "./x"]),
      ).toEqual({
        error:
          'Source #2: invalid module source: source "git::https://example.com" is missing the path component',
      });
    });

    it("accepts an empty list", () => {
      expect(parseSources([])).toEqual({ data: [] });
    });
  });

  describe("vendorPathFor", () => {
    const originalVendorDir = process.env.MODSOURCE_VENDOR_DIR;

    afterEach(() => {
      if (originalVendorDir === undefined) {
        delete process.env.MODSOURCE_VENDOR_DIR;
      } else {
        process.env.MODSOURCE_VENDOR_DIR = originalVendorDir;
      }
    });

    it("nests the ref under the source path", () => {
      const source = parseSource("github.com/org/repo?ref=v1.0");
      expect(vendorPathFor(source, "/vendor")).toBe("/vendor/github.com/org/repo/v1.0");
    });

    it("uses the source path alone without a ref", () => {
      const source = parseSource("git@github.com:org/repo.git");
      expect(vendorPathFor(source, "/vendor")).toBe("/vendor/github.com/org/repo");
    });

    it("keeps absolute file paths inside the vendor dir", () => {
      const source = parseSource("git::file:///srv/git/mods.git?ref=v2");
      expect(vendorPathFor(source, "/vendor")).toBe("/vendor/srv/git/mods/v2");
    });

    it("rejects paths that climb out of the vendor dir", () => {
      const source = parseSource("git::https://example.com/../../../etc?ref=x");
      expect(() => vendorPathFor(source, "/vendor")).toThrow(
        'invalid module source: source "git::https://example.com/../../../etc?ref=x" resolves to /etc/x, outside /vendor',
      );
    });

    it("rejects refs that climb out of the vendor dir", () => {
      const source = parseSource("github.com/org/repo?ref=../../../../../etc");
      expect(source.ref).toBe("../../../../../etc");
      expect(() => vendorPathFor(source, "/vendor")).toThrow(InvalidModuleSourceError);
    });

    it("rejects refs that resolve to the vendor dir itself", () => {
      const source = parseSource("github.com/org/repo?ref=../../../..");
      expect(() => vendorPathFor(source, "/vendor")).toThrow(InvalidModuleSourceError);
    });

    it("defaults to the configured vendor dir", () => {
      process.env.MODSOURCE_VENDOR_DIR = "/srv/vendor";
      const source = parseSource("github.com/org/repo?ref=v1.0");
      expect(vendorPathFor(source)).toBe("/srv/vendor/github.com/org/repo/v1.0");
    });
  });

  describe("validateModuleSource", () => {
    it("accepts parsed sources", () => {
      const source = parseSource("git::https://example.com/repo.git//sub?ref=abc");
      expect(validateModuleSource({ ...source })).toEqual({ data: source });
    });

    it("reports broken invariants", () => {
      expect(
        validateModuleSource({
          raw: "x",
          url: "https://example.com/x.git",
          path: "example.com/x",
          subdir: "sub",
          ref: "",
        }),
      ).toEqual({
        error: "Invalid module source record: subdir must be empty or start with /",
      });
    });
  });

  describe("formatModuleSource", () => {
    it("describes url, ref and subdir", () => {
      const source = parseSource("github.com/org/repo//modules/foo?ref=v1.0");
      expect(formatModuleSource(source)).toBe(
        "https://github.com/org/repo.git ref v1.0 subdir /modules/foo",
      );
    });

    it("describes a bare url", () => {
      expect(formatModuleSource(parseSource("github.com/org/repo"))).toBe(
        "https://github.com/org/repo.git",
      );
    });
  });

  describe("logError", () => {
    it("logs errors with their stack", () => {
      const error = new Error("boom");
      logError({ error, shortMessage: "Fetching module failed" });
      expect(backendLogger.error).toHaveBeenCalledWith("Fetching module failed", {
        meta: { name: "Error", message: "boom" },
        stack: error.stack,
      });
    });

    it("logs non-error values", () => {
      logError({ error: "bad", shortMessage: "Fetching module failed" });
      expect(backendLogger.error).toHaveBeenCalledWith("Fetching module failed", {
        meta: { error: "bad" },
      });
    });
  });
});
