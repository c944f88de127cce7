import { Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";
import { InvalidResponseError, ValidationError } from "./errors.js";
import { assertSchema, describeSchemaErrors, parseResponse } from "./validation.js";

const PageSchema = Type.Object({
  total: Type.Integer(),
  items: Type.Array(Type.String()),
});

describe("describeSchemaErrors", () => {
  it("lists problems by path", () => {
    const problems = describeSchemaErrors(PageSchema, { total: "x", items: [] });

    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith("/total: ")).toBe(true);
  });
});

describe("assertSchema", () => {
  it("returns valid input", () => {
    const value = { total: 1, items: ["a"] };
    expect(assertSchema(PageSchema, value, "page")).toBe(value);
  });

  it("throws a ValidationError with the problems as details", () => {
    let thrown: unknown;
    try {
      assertSchema(PageSchema, { total: 1 }, "page", "aws");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    if (!(thrown instanceof ValidationError)) return;
    expect(thrown.message.startsWith("Invalid page: /items: ")).toBe(true);
    expect(thrown.provider).toBe("aws");
    expect(thrown.details).toEqual(describeSchemaErrors(PageSchema, { total: 1 }));
  });
});

describe("parseResponse", () => {
  it("keeps the raw payload on a mismatch", () => {
    const payload = { total: 2.5, items: "nope" };
    let thrown: unknown;
    try {
      parseResponse(PageSchema, payload, "huawei", "ListRecords");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InvalidResponseError);
    if (!(thrown instanceof InvalidResponseError)) return;
    expect(thrown.message.startsWith("Invalid ListRecords response: ")).toBe(true);
    expect(thrown.details).toBe(payload);
  });
});
