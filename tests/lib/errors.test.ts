import { describe, it, expect } from "vitest";
import {
  WikismithError,
  ValidationError,
  ParseError,
  ConfigError,
  GenerationError,
  TemplateNotFoundError,
  TemplateLoadError,
  TemplateCycleError,
  RecursionLimitError,
} from "@/lib/errors.js";

describe("Error Classes", () => {
  describe("WikismithError", () => {
    it("should create a basic error", () => {
      const error = new WikismithError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("WikismithError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(WikismithError);
    });

    it("should include context when provided", () => {
      const context = { key: "value" };
      const error = new WikismithError("Test message", "TEST_CODE", context);
      expect(error.context).toBe(context);
    });

    it("should have a stack trace", () => {
      const error = new WikismithError("Test message", "TEST_CODE");
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new WikismithError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "WikismithError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ValidationError", () => {
    it("should create a validation error", () => {
      const error = new ValidationError("Invalid input", { field: "tags" });
      expect(error.name).toBe("ValidationError");
      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.context).toEqual({ field: "tags" });
      expect(error).toBeInstanceOf(WikismithError);
    });
  });

  describe("ParseError", () => {
    it("should carry the offending text", () => {
      const error = new ParseError("Unterminated table", "{|\n| a");
      expect(error.name).toBe("ParseError");
      expect(error.code).toBe("PARSE_ERROR");
      expect(error.text).toBe("{|\n| a");
      expect(error.context).toEqual({ text: "{|\n| a" });
    });

    it("should merge extra context", () => {
      const error = new ParseError("Bad", "x", { templateName: "Box" });
      expect(error.context).toEqual({ templateName: "Box", text: "x" });
    });
  });

  describe("ConfigError", () => {
    it("should create a config error", () => {
      const error = new ConfigError("Invalid config", { configPath: "wikismith.config.yaml" });
      expect(error.name).toBe("ConfigError");
      expect(error.code).toBe("CONFIG_ERROR");
      expect(error.context).toEqual({ configPath: "wikismith.config.yaml" });
    });
  });

  describe("GenerationError", () => {
    it("should create a generation error", () => {
      const error = new GenerationError("Failed to write page");
      expect(error.name).toBe("GenerationError");
      expect(error.code).toBe("GENERATION_ERROR");
      expect(error).toBeInstanceOf(WikismithError);
    });
  });

  describe("template errors", () => {
    it("should name the template and its key when not found", () => {
      const error = new TemplateNotFoundError("Cell Align", "cell_align");
      expect(error.message).toBe("Template not found: Cell Align -> cell_align");
      expect(error.code).toBe("TEMPLATE_NOT_FOUND");
      expect(error.templateName).toBe("Cell Align");
      expect(error.key).toBe("cell_align");
    });

    it("should describe a load failure", () => {
      const error = new TemplateLoadError("Box", "/wiki/Box.wikitext", "EACCES");
      expect(error.message).toBe("Failed to load template Box from /wiki/Box.wikitext: EACCES");
      expect(error.code).toBe("TEMPLATE_LOAD_ERROR");
    });

    it("should render the cycle chain", () => {
      const error = new TemplateCycleError(["a", "b", "a"]);
      expect(error.message).toBe("Template cycle detected: a -> b -> a");
      expect(error.chain).toEqual(["a", "b", "a"]);
      expect(error.code).toBe("TEMPLATE_CYCLE");
    });

    it("should flag recursion limits", () => {
      const error = new RecursionLimitError("Too deep", { depth: 101 });
      expect(error.name).toBe("RecursionLimitError");
      expect(error.code).toBe("RECURSION_LIMIT");
      expect(error.context).toEqual({ depth: 101 });
    });
  });
});
