import { describe, expect, it } from "vitest";
import { buildResourceRegistry, resourceIdFromLocator } from "./resources.js";
import { makeJob } from "../testing/fixtures.js";

describe("resourceIdFromLocator", () => {
  it("takes the segment after the last slash", () => {
    expect(resourceIdFromLocator("arn:aws:ec2:eu-west-1:111122223333:volume/vol-1")).toBe("vol-1");
    expect(resourceIdFromLocator("arn:aws:elasticfilesystem:eu-west-1:111122223333:file-system/fs-9/x")).toBe("x");
  });

  it("returns the whole locator when there is no slash", () => {
    expect(resourceIdFromLocator("arn:aws:rds:eu-west-1:111122223333:db:orders")).toBe(
      "arn:aws:rds:eu-west-1:111122223333:db:orders"
    );
  });
});

describe("buildResourceRegistry", () => {
  it("keeps the first job seen for each resource", () => {
    const registry = buildResourceRegistry([
      makeJob({ id: "a", createdAt: new Date("2024-05-02T10:00:00Z"), vaultName: "first" }),
      makeJob({ id: "b", createdAt: new Date("2024-05-20T10:00:00Z"), vaultName: "second" }),
      makeJob({
        id: "c",
        resourceLocator: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-2",
        createdAt: new Date("2024-05-03T11:15:00Z")
      })
    ]);

    expect(Array.from(registry.keys())).toEqual(["vol-1", "vol-2"]);
    expect(registry.get("vol-1")).toEqual({
      resource_id: "vol-1",
      resource_type: "EBS",
      resource_locator: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-1",
      last_backup_time: "2024-05-02 10:00",
      vault_name: "first"
    });
  });

  it("fills absent attributes with N/A", () => {
    const registry = buildResourceRegistry([
      makeJob({ resourceType: undefined, vaultName: undefined })
    ]);
    expect(registry.get("vol-1")?.resource_type).toBe("N/A");
    expect(registry.get("vol-1")?.vault_name).toBe("N/A");
  });

  it("formats the backup time in the given time zone", () => {
    const registry = buildResourceRegistry(
      [makeJob({ createdAt: new Date("2024-05-31T23:30:00Z") })],
      "Europe/Berlin"
    );
    expect(registry.get("vol-1")?.last_backup_time).toBe("2024-06-01 01:30");
  });
});
