import { describe, expect, it } from "vitest";
import { UnsupportedDocumentError } from "../errors.js";
import { templateRecords } from "./cloudformation.js";
import { DIALECTS, isDialect, toRawRecords } from "./index.js";
import { recordFileRecords } from "./records.js";

const template = {
  AWSTemplateFormatVersion: "2010-09-09",
  Resources: {
    LogsBucket: { Type: "AWS::S3::Bucket", Properties: { BucketName: "logs" } },
    Topic: { Type: "AWS::SNS::Topic" },
  },
};

describe("templateRecords", () => {
  it("addresses resources by logical id", () => {
    expect(templateRecords(template)).toEqual([
      {
        address: "LogsBucket",
        kind: "AWS::S3::Bucket",
        source: "cloudformation",
        attributes: { BucketName: "logs" },
      },
      { address: "Topic", kind: "AWS::SNS::Topic", source: "cloudformation", attributes: {} },
    ]);
  });
});

describe("recordFileRecords", () => {
  it("accepts an array or a resources wrapper", () => {
    const record = { address: "web", kind: "aws_instance", attributes: { ami: "ami-1" }, extra: true };
    const expected = [{ address: "web", kind: "aws_instance", attributes: { ami: "ami-1" } }];
    expect(recordFileRecords([record])).toEqual(expected);
    expect(recordFileRecords({ resources: [record] })).toEqual(expected);
  });

  it("rejects items that are not objects", () => {
    expect(() => recordFileRecords([{ address: "a" }, "b"])).toThrow("Resource record 1 is not an object");
  });

  it("rejects other shapes", () => {
    expect(() => recordFileRecords({ items: [] })).toThrow(
      "Expected an array of resource records or an object with a resources array",
    );
  });
});

describe("toRawRecords", () => {
  it("reads each dialect's own documents", () => {
    expect(toRawRecords("cloudformation", [template]).map((r) => r.address)).toEqual(["LogsBucket", "Topic"]);
    expect(
      toRawRecords("kubernetes", [{ apiVersion: "v1", kind: "Namespace", metadata: { name: "ops" } }]).map(
        (r) => r.address,
      ),
    ).toEqual(["Namespace/default/ops"]);
    expect(
      toRawRecords("terraform", [{ version: 4, resources: [{ mode: "managed", type: "t", name: "n", instances: [{}] }] }]),
    ).toEqual([{ address: "t.n", kind: "t", source: "terraform", attributes: {} }]);
  });

  it("accepts record files for every dialect", () => {
    for (const dialect of DIALECTS) {
      expect(toRawRecords(dialect, [[{ address: "a", kind: "k" }]])).toHaveLength(1);
    }
  });

  it("concatenates records across documents", () => {
    expect(toRawRecords("records", [[{ address: "a" }], { resources: [{ address: "b" }] }]).map((r) => r.address)).toEqual(
      ["a", "b"],
    );
  });

  it("names the document it cannot read", () => {
    const run = () => toRawRecords("cloudformation", [[], { Parameters: {} }]);
    expect(run).toThrow(UnsupportedDocumentError);
    expect(run).toThrow("Document 1 is not a recognised cloudformation document");
  });
});

describe("isDialect", () => {
  it("accepts known dialects only", () => {
    expect(isDialect("terraform")).toBe(true);
    expect(isDialect("pulumi")).toBe(false);
  });
});
