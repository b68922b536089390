/**
 * Converge — Differ Tests
 */

import { describe, it, expect } from "vitest";
import { diff, applyIgnoreChanges } from "./differ.js";
import { buildGraph } from "./graph.js";
import { MemoryStateStore } from "./memory-store.js";
import { ReplaceRuleRegistry } from "./registry.js";
import { PlanningError } from "./errors.js";
import { createProvisionLogger } from "./logger.js";
import { ref, unknown } from "./values.js";
import type { AttributeMap, Resource, StateRecord } from "./types.js";

const logger = createProvisionLogger("test", { level: "fatal" });

function record(
  kind: string,
  name: string,
  handle: string,
  attributes: AttributeMap,
  extra: Partial<StateRecord> = {},
): StateRecord {
  return { kind, name, handle, attributes, computed: {}, dependencies: [], updatedAt: "2024-01-01T00:00:00.000Z", ...extra };
}

async function run(resources: Resource[], records: StateRecord[], options: Parameters<typeof diff>[2] = {}) {
  return diff(buildGraph(resources, { logger }), new MemoryStateStore(records), { logger, ...options });
}

const vpc: Resource = { kind: "vpc", name: "main", attributes: { cidr: "10.0.0.0/16" } };
const subnet: Resource = { kind: "subnet", name: "a", attributes: { vpc_id: ref("vpc", "main"), cidr: "10.0.1.0/24" } };

// =============================================================================
// Classification
// =============================================================================

describe("diff", () => {
  it("plans creates on empty state with handles known after apply", async () => {
    const entries = await run([subnet, vpc], []);

    expect(entries.map((e) => `${e.action} ${e.id}`)).toEqual(["create vpc.main", "create subnet.a"]);
    expect(entries[0].attributeDiffs).toEqual([{ path: "cidr", after: "10.0.0.0/16", requiresReplace: false }]);
    expect(entries[1].planned).toEqual({ vpc_id: unknown("vpc.main"), cidr: "10.0.1.0/24" });
    expect(entries[1].dependencies).toEqual(["vpc.main"]);
  });

  it("reports a single changed attribute as an update", async () => {
    const db: Resource = { kind: "db", name: "main", attributes: { size: 3, engine: "pg" } };
    const entries = await run([db], [record("db", "main", "db-1", { size: 2, engine: "pg" })]);

    expect(entries).toHaveLength(1);
    expect(entries[0].action).toBe("update");
    expect(entries[0].attributeDiffs).toEqual([{ path: "size", before: 2, after: 3, requiresReplace: false }]);
    expect(entries[0].prior?.handle).toBe("db-1");
  });

  it("is a noop when resolved attributes equal the record", async () => {
    const entries = await run(
      [vpc, subnet],
      [
        record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" }),
        record("subnet", "a", "subnet-1", { vpc_id: "vpc-1", cidr: "10.0.1.0/24" }, { dependencies: ["vpc.main"] }),
      ],
    );
    expect(entries.map((e) => e.action)).toEqual(["noop", "noop"]);
    expect(entries[1].planned).toEqual({ vpc_id: "vpc-1", cidr: "10.0.1.0/24" });
  });

  it("resolves computed attributes of unchanged targets from state", async () => {
    const instance: Resource = { kind: "instance", name: "web", attributes: { ip: ref("eip", "web", "public_ip") } };
    const eip: Resource = { kind: "eip", name: "web", attributes: {} };
    const entries = await run(
      [eip, instance],
      [
        record("eip", "web", "eip-1", {}, { computed: { public_ip: "203.0.113.7" } }),
        record("instance", "web", "i-1", { ip: "203.0.113.7" }, { dependencies: ["eip.web"] }),
      ],
    );
    expect(entries.map((e) => e.action)).toEqual(["noop", "noop"]);
  });

  it("prefers a recorded computed value over the desired one for unchanged targets", async () => {
    const named: Resource = { kind: "vpc", name: "main", attributes: { name: "main" } };
    const dependent: Resource = { kind: "subnet", name: "a", attributes: { vpc_name: ref("vpc", "main", "name") } };
    const entries = await run(
      [named, dependent],
      [
        record("vpc", "main", "vpc-1", { name: "main" }, { computed: { name: "main-normalized" } }),
        record("subnet", "a", "subnet-1", { vpc_name: "main-normalized" }, { dependencies: ["vpc.main"] }),
      ],
    );
    expect(entries.map((e) => e.action)).toEqual(["noop", "noop"]);
    expect(entries[1].planned).toEqual({ vpc_name: "main-normalized" });
  });

  it("uses the desired value of a target that is changing", async () => {
    const entries = await run(
      [
        { kind: "vpc", name: "main", attributes: { name: "main", cidr: "10.1.0.0/16" } },
        { kind: "subnet", name: "a", attributes: { vpc_name: ref("vpc", "main", "name") } },
      ],
      [
        record("vpc", "main", "vpc-1", { name: "main", cidr: "10.0.0.0/16" }, { computed: { name: "main-normalized" } }),
        record("subnet", "a", "subnet-1", { vpc_name: "main-normalized" }, { dependencies: ["vpc.main"] }),
      ],
    );
    expect(entries.map((e) => e.action)).toEqual(["update", "update"]);
    expect(entries[1].attributeDiffs).toEqual([
      { path: "vpc_name", before: "main-normalized", after: "main", requiresReplace: false },
    ]);
  });

  it("updates a resource whose only change is a new dependency", async () => {
    const db: Resource = { kind: "db", name: "main", attributes: {} };
    const bucket: Resource = { kind: "bucket", name: "logs", attributes: {}, dependsOn: [{ kind: "db", name: "main" }] };
    const dns: Resource = { kind: "dns", name: "www", attributes: { target: ref("bucket", "logs") } };
    const entries = await run(
      [bucket, db, dns],
      [
        record("db", "main", "db-1", {}),
        record("bucket", "logs", "bucket-1", {}),
        record("dns", "www", "dns-1", { target: "bucket-1" }, { dependencies: ["bucket.logs"] }),
      ],
    );

    expect(entries.map((e) => `${e.action} ${e.id}`)).toEqual(["noop db.main", "update bucket.logs", "noop dns.www"]);
    expect(entries[1].attributeDiffs).toEqual([]);
    expect(entries[1].dependencies).toEqual(["db.main"]);
    expect(entries[2].planned).toEqual({ target: "bucket-1" });
  });

  it("turns references to changing targets into unknown values", async () => {
    const entries = await run(
      [{ ...vpc, attributes: { cidr: "10.0.0.0/16", tags: { env: "prod" } } }, subnet],
      [
        record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" }),
        record("subnet", "a", "subnet-1", { vpc_id: "vpc-1", cidr: "10.0.1.0/24" }),
      ],
    );
    expect(entries.map((e) => e.action)).toEqual(["update", "update"]);
    expect(entries[1].attributeDiffs).toEqual([
      { path: "vpc_id", before: "vpc-1", after: unknown("vpc.main"), requiresReplace: false },
    ]);
  });

  it("deletes records that are no longer declared", async () => {
    const entries = await run(
      [vpc],
      [
        record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" }),
        record("subnet", "old", "subnet-9", { cidr: "10.0.9.0/24" }, { dependencies: ["vpc.main"] }),
      ],
    );
    expect(entries.map((e) => `${e.action} ${e.id}`)).toEqual(["noop vpc.main", "delete subnet.old"]);
    expect(entries[1].dependencies).toEqual(["vpc.main"]);
    expect(entries[1].attributeDiffs).toEqual([{ path: "cidr", before: "10.0.9.0/24", requiresReplace: false }]);
  });

  it("carries the sensitive attribute list", async () => {
    const entries = await run([{ kind: "db", name: "main", attributes: { password: "test-secret" }, sensitive: ["password"] }], []);
    expect(entries[0].sensitive).toEqual(["password"]);
  });
});

// =============================================================================
// Replacement & Lifecycle
// =============================================================================

describe("diff replacement", () => {
  const rules = new ReplaceRuleRegistry();
  rules.register("vpc", ["cidr"]);

  it("splits a replacement into destroy and create halves", async () => {
    const entries = await run(
      [{ ...vpc, attributes: { cidr: "10.1.0.0/16" } }],
      [record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" })],
      { replaceRules: rules },
    );

    expect(entries.map((e) => `${e.action} ${e.id}`)).toEqual(["delete vpc.main#destroy", "create vpc.main#create"]);
    expect(entries[0].replace).toEqual({ phase: "destroy", reasons: ["cidr"], createBeforeDestroy: false });
    expect(entries[1].replace).toEqual({ phase: "create", reasons: ["cidr"], createBeforeDestroy: false });
    expect(entries[1].attributeDiffs).toEqual([
      { path: "cidr", before: "10.0.0.0/16", after: "10.1.0.0/16", requiresReplace: true },
    ]);
  });

  it("accepts predicate rules and family prefixes", async () => {
    const predicates = new ReplaceRuleRegistry();
    predicates.registerFamily("aws_", (d) => d.path === "az");
    const entries = await run(
      [{ kind: "aws_subnet", name: "a", attributes: { az: "b", name: "x" }, lifecycle: { createBeforeDestroy: true } }],
      [record("aws_subnet", "a", "s-1", { az: "a", name: "x" })],
      { replaceRules: predicates },
    );
    expect(entries.map((e) => e.id)).toEqual(["aws_subnet.a#destroy", "aws_subnet.a#create"]);
    expect(entries[0].replace?.createBeforeDestroy).toBe(true);
  });

  it("updates in place when no changed attribute forces replacement", async () => {
    const entries = await run(
      [{ ...vpc, attributes: { cidr: "10.0.0.0/16", name: "renamed" } }],
      [record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" })],
      { replaceRules: rules },
    );
    expect(entries.map((e) => e.action)).toEqual(["update"]);
  });

  it("replaces a resource whose trigger changes", async () => {
    const image: Resource = { kind: "image", name: "base", attributes: { version: "2" } };
    const instance: Resource = {
      kind: "instance",
      name: "web",
      attributes: { size: "small" },
      lifecycle: { replaceTriggeredBy: [{ kind: "image", name: "base" }] },
    };
    const entries = await run(
      [image, instance],
      [record("image", "base", "img-1", { version: "1" }), record("instance", "web", "i-1", { size: "small" })],
    );
    expect(entries.map((e) => `${e.action} ${e.id}`)).toEqual([
      "update image.base",
      "delete instance.web#destroy",
      "create instance.web#create",
    ]);
    expect(entries[2].replace?.reasons).toEqual(["image.base"]);
  });

  it("ignores changes on ignored paths", async () => {
    const entries = await run(
      [{ ...vpc, attributes: { cidr: "10.0.0.0/16", tags: { owner: "new" } }, lifecycle: { ignoreChanges: ["tags"] } }],
      [record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16", tags: { owner: "old" } })],
    );
    expect(entries.map((e) => e.action)).toEqual(["noop"]);
  });

  it("refuses to replace a protected resource", async () => {
    await expect(
      run(
        [{ ...vpc, attributes: { cidr: "10.1.0.0/16" }, lifecycle: { preventDestroy: true } }],
        [record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" })],
        { replaceRules: rules },
      ),
    ).rejects.toThrow("Refusing to destroy protected resource(s): vpc.main");
  });
});

describe("diff in destroy mode", () => {
  const records = [
    record("vpc", "main", "vpc-1", { cidr: "10.0.0.0/16" }),
    record("subnet", "a", "subnet-1", { vpc_id: "vpc-1" }, { dependencies: ["vpc.main"] }),
  ];

  it("deletes every record", async () => {
    const entries = await run([vpc, subnet], records, { mode: "destroy" });
    expect(entries.map((e) => `${e.action} ${e.id}`)).toEqual(["delete subnet.a", "delete vpc.main"]);
  });

  it("honours preventDestroy", async () => {
    let caught: unknown;
    try {
      await run([{ ...vpc, lifecycle: { preventDestroy: true } }, subnet], records, { mode: "destroy" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PlanningError);
    if (caught instanceof PlanningError) {
      expect(caught.reason).toBe("PREVENT_DESTROY");
      expect(caught.addresses).toEqual(["vpc.main"]);
    }
  });
});

describe("applyIgnoreChanges", () => {
  it("keeps recorded values and drops ignored paths that were never recorded", () => {
    expect(
      applyIgnoreChanges({ a: 1, tags: { x: "new", y: "keep" }, extra: 5 }, { a: 1, tags: { x: "old" } }, ["tags.x", "extra"]),
    ).toEqual({ a: 1, tags: { x: "old", y: "keep" } });
  });
});
