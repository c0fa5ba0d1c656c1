import { describe, expect, it } from "vitest";
import { MissingTemplateKeyError, TemplateNotFoundError, TemplateSyntaxError } from "./errors.js";
import { ConfigTemplateStore } from "./template-store.js";
import { scanTemplate, TemplateRenderer } from "./templates.js";

const context = { index: 0, count: 1, previous: "" };

function rendererFor(prompts: Record<string, string>, env: NodeJS.ProcessEnv = {}) {
  return new TemplateRenderer(new ConfigTemplateStore(prompts), {
    env,
    now: () => new Date("2025-03-04T10:00:00Z"),
  });
}

describe("templates", () => {
  describe("scanTemplate", () => {
    it("collects keys and whether they declare defaults", () => {
      const refs = scanTemplate('<%= it.name %> <%= it.topic ?? "general" %> <%= it.mood || "calm" %>');

      expect([...refs.keys]).toEqual([
        ["name", { required: true, defaulted: false }],
        ["topic", { required: false, defaulted: true }],
        ["mood", { required: false, defaulted: true }],
      ]);
    });

    it("treats keys inside a default expression as optional", () => {
      const refs = scanTemplate("<%= it.tone ?? it.style %>; <%= it.a || (it.b + it.c) %>; <% x; it.d %>");

      expect(refs.keys.get("style")).toEqual({ required: false, defaulted: false });
      expect(refs.keys.get("b")).toEqual({ required: false, defaulted: false });
      expect(refs.keys.get("c")).toEqual({ required: false, defaulted: false });
      expect(refs.keys.get("d")).toEqual({ required: true, defaulted: false });
    });

    it("collects bracket references with string keys", () => {
      const refs = scanTemplate(`<%= it['lang'] %> <%= it["env"]["HOME"] ?? "/" %>`);

      expect([...refs.keys]).toEqual([["lang", { required: true, defaulted: false }]]);
      expect([...refs.envVars]).toEqual([["HOME", { required: false, defaulted: true }]]);
    });

    it("separates environment variables", () => {
      const refs = scanTemplate("<%= it.env.CITY %>");

      expect([...refs.envVars]).toEqual([["CITY", { required: true, defaulted: false }]]);
      expect(refs.keys.size).toBe(0);
    });

    it("ignores text outside template tags", () => {
      const refs = scanTemplate("Mention it.name in prose");

      expect(refs.keys.size).toBe(0);
    });

    it("collects includes", () => {
      const refs = scanTemplate('<%~ include("@base") %> <%~ include(\'@footer\', it) %>');

      expect([...refs.includes]).toEqual(["base", "footer"]);
    });
  });

  describe("TemplateRenderer", () => {
    it("substitutes the chunk and overrides", () => {
      const template = rendererFor({ greet: "Hello <%= it.name %>: <%= it.prompt %>" }).prepare("greet");

      expect(template.render("chunk", { name: "Ann" }, context)).toBe("Hello Ann: chunk");
    });

    it("uses declared defaults unless overridden", () => {
      const template = rendererFor({ t: '<%= it.topic ?? "general" %>' }).prepare("t");

      expect(template.render("", {}, context)).toBe("general");
      expect(template.render("", { topic: "science" }, context)).toBe("science");
    });

    it("reports every missing key", () => {
      const template = rendererFor({ t: "<%= it.a %> <%= it.b %>" }).prepare("t");

      expect(template.missingKeys({})).toEqual(["a", "b"]);
      expect(template.missingKeys({ a: "1" })).toEqual(["b"]);
      expect(() => template.render("x", {}, context)).toThrow(MissingTemplateKeyError);
      expect(() => template.render("x", {}, context)).toThrow(
        "Template 't' is missing values for: a, b",
      );
    });

    it("does not require a key that only serves as a fallback", () => {
      const template = rendererFor({ t: "<%= it.tone ?? it.style %>" }).prepare("t");

      expect(template.missingKeys({ tone: "calm" })).toEqual([]);
      expect(template.render("x", { tone: "calm" }, context)).toBe("calm");
      expect(template.render("x", { style: "terse" }, context)).toBe("terse");
    });

    it("fails when neither the key nor its fallback is supplied", () => {
      const template = rendererFor({ t: "<%= it.tone ?? it.style %>" }).prepare("t");

      expect(() => template.render("x", {}, context)).toThrow("Template 't' is missing a value for: style");
    });

    it("rejects a bracket reference to an unset key", () => {
      const template = rendererFor({ t: "<%= it['lang'] %>|x" }).prepare("t");

      expect(template.missingKeys({})).toEqual(["lang"]);
      expect(() => template.render("x", {}, context)).toThrow(MissingTemplateKeyError);
      expect(template.render("x", { lang: "fr" }, context)).toBe("fr|x");
    });

    it("catches unset keys read through computed names while rendering", () => {
      const template = rendererFor({ t: '<% const key = "lang" %><%= it[key] %>' }).prepare("t");

      expect(template.missingKeys({})).toEqual([]);
      expect(() => template.render("x", {}, context)).toThrow("Template 't' is missing a value for: lang");
      expect(template.render("x", { lang: "de" }, context)).toBe("de");
    });

    it("catches unset environment variables read through computed names", () => {
      const template = rendererFor({ t: '<% const name = "CITY" %><%= it.env[name] %>' }).prepare("t");

      expect(() => template.render("x", {}, context)).toThrow("Template 't' is missing a value for: env.CITY");
    });

    it("reports an unset key even when reading it breaks the template", () => {
      const template = rendererFor({ t: '<% const key = "lang" %><%= it[key].toUpperCase() %>' }).prepare("t");

      expect(() => template.render("x", {}, context)).toThrow(MissingTemplateKeyError);
    });

    it("never reports reserved keys as missing", () => {
      const template = rendererFor({
        t: "<%= it.prompt %> <%= it.index %> <%= it.count %> <%= it.previous %> <%= it.date %>",
      }).prepare("t");

      expect(template.missingKeys({})).toEqual([]);
    });

    it("ignores overrides for reserved keys", () => {
      const template = rendererFor({ t: "<%= it.prompt %>" }).prepare("t");

      expect(template.render("chunk", { prompt: "other" }, context)).toBe("chunk");
    });

    it("renders a template without the prompt placeholder", () => {
      const template = rendererFor({ t: "Static text" }).prepare("t");

      expect(template.render("ignored", {}, context)).toBe("Static text");
    });

    it("exposes chunk position and previous completion", () => {
      const template = rendererFor({ t: "<%= it.index %>/<%= it.count %> <%= it.previous %>" }).prepare("t");

      expect(template.render("x", {}, { index: 1, count: 3, previous: "before" })).toBe("1/3 before");
    });

    it("exposes the date and environment", () => {
      const template = rendererFor({ t: "<%= it.date %> <%= it.env.CITY %>" }, { CITY: "Oslo" }).prepare("t");

      expect(template.render("x", {}, context)).toBe("2025-03-04 Oslo");
    });

    it("treats unset environment variables as missing keys", () => {
      const template = rendererFor({ t: "<%= it.env.CITY %>" }).prepare("t");

      expect(template.missingKeys({})).toEqual(["env.CITY"]);
    });

    it("resolves partials through the lookup", () => {
      const template = rendererFor({
        base: "Be brief.",
        main: '<%~ include("@base") %> <%= it.prompt %>',
      }).prepare("main");

      expect(template.render("hi", {}, context)).toBe("Be brief. hi");
    });

    it("collects keys from partials", () => {
      const template = rendererFor({
        base: "Tone: <%= it.tone %>.",
        main: '<%~ include("@base", it) %> <%= it.prompt %>',
      }).prepare("main");

      expect(template.missingKeys({})).toEqual(["tone"]);
      expect(template.render("hi", { tone: "dry" }, context)).toBe("Tone: dry. hi");
    });

    it("throws TemplateNotFoundError for unknown templates", () => {
      expect(() => rendererFor({}).prepare("nope")).toThrow(TemplateNotFoundError);
    });

    it("throws TemplateNotFoundError for unknown partials", () => {
      const renderer = rendererFor({ main: '<%~ include("@missing") %>' });

      expect(() => renderer.prepare("main")).toThrow(TemplateNotFoundError);
      expect(() => renderer.prepare("main")).toThrow("Template 'missing' not found");
    });

    it("throws TemplateSyntaxError for invalid syntax", () => {
      const renderer = rendererFor({ broken: "<%= it.name " });

      expect(() => renderer.prepare("broken")).toThrow(TemplateSyntaxError);
    });

    it("lists known templates", () => {
      expect(rendererFor({ b: "", a: "" }).list()).toEqual(["a", "b"]);
    });
  });
});
