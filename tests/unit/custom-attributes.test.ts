import { convergeCustomAttributes, deleteCustomAttributes } from "@/core/custom-attributes";
import { beforeEach, describe, expect, it } from "vitest";
import { FakeManageIq } from "../helpers/fake-manageiq";

describe("convergeCustomAttributes", () => {
  let api: FakeManageIq;

  beforeEach(() => {
    api = new FakeManageIq().addEntity("providers", "7", "ocp01", [
      { id: "50", href: "/providers/7/custom_attributes/50", name: "ca2", section: "metadata", value: "old" },
      { id: "51", href: "/providers/7/custom_attributes/51", name: "ca3", section: "metadata", value: "keep" },
    ]);
  });

  it("adds missing attributes and edits changed values", async () => {
    const result = await convergeCustomAttributes(api, {
      entityType: "provider",
      entityName: "ocp01",
      attributes: [
        { name: "ca1", section: "metadata", value: "v1" },
        { name: "ca2", section: "metadata", value: "new" },
      ],
    });

    expect(result).toEqual({
      changed: true,
      msg: "Successfully set the custom attributes to ocp01 provider",
      updates: {
        Added: [{ id: "1000", href: "/providers/7/custom_attributes/1000", name: "ca1", section: "metadata", value: "v1" }],
        Updated: [{ id: "50", href: "/providers/7/custom_attributes/50", name: "ca2", section: "metadata", value: "new" }],
      },
    });
    expect(api.writes().map((call) => call.body)).toEqual([
      { action: "add", resources: [{ name: "ca1", section: "metadata", value: "v1" }] },
      {
        action: "edit",
        resources: [{ href: "/providers/7/custom_attributes/50", name: "ca2", section: "metadata", value: "new" }],
      },
    ]);
  });

  it("leaves attributes that were not requested in place", async () => {
    await convergeCustomAttributes(api, {
      entityType: "provider",
      entityName: "ocp01",
      attributes: [{ name: "ca1", section: "metadata", value: "v1" }],
    });

    expect(api.customAttributesOf("/providers/7").map((attribute) => attribute.name)).toEqual(["ca2", "ca3", "ca1"]);
  });

  it("reports no change when everything already matches", async () => {
    const request = {
      entityType: "provider" as const,
      entityName: "ocp01",
      attributes: [{ name: "ca2", section: "metadata", value: "new" }],
    };
    await convergeCustomAttributes(api, request);
    const second = await convergeCustomAttributes(api, request);

    expect(second).toEqual({
      changed: false,
      msg: "Custom attributes of ocp01 provider are already up to date",
      updates: { Added: [], Updated: [] },
    });
    expect(api.writes()).toHaveLength(1);
  });

  it("adds an attribute whose name exists only in another section", async () => {
    await convergeCustomAttributes(api, {
      entityType: "provider",
      entityName: "ocp01",
      attributes: [{ name: "ca2", section: "cluster", value: "old" }],
    });

    expect(api.writes().map((call) => call.body?.action)).toEqual(["add"]);
  });

  it("targets other entity collections", async () => {
    api.addEntity("vms", "30", "web01");

    await convergeCustomAttributes(api, {
      entityType: "vm",
      entityName: "web01",
      attributes: [{ name: "owner", section: "metadata", value: "ops" }],
    });

    expect(api.writes().map((call) => call.path)).toEqual(["/vms/30/custom_attributes"]);
    expect(api.customAttributesOf("/vms/30")).toHaveLength(1);
  });

  it("fails when the entity cannot be found", async () => {
    await expect(
      convergeCustomAttributes(api, {
        entityType: "provider",
        entityName: "ghost",
        attributes: [{ name: "ca1", section: "metadata", value: "v1" }],
      }),
    ).rejects.toThrow("Failed to find ghost provider");
  });

  it("writes nothing on a dry run", async () => {
    const result = await convergeCustomAttributes(
      api,
      {
        entityType: "provider",
        entityName: "ocp01",
        attributes: [{ name: "ca1", section: "metadata", value: "v1" }],
      },
      { dryRun: true },
    );

    expect(result.msg).toBe("Would set the custom attributes of ocp01 provider");
    expect(result.updates.Added).toEqual([{ name: "ca1", section: "metadata", value: "v1" }]);
    expect(api.writes()).toEqual([]);
  });
});

describe("deleteCustomAttributes", () => {
  let api: FakeManageIq;

  beforeEach(() => {
    api = new FakeManageIq().addEntity("providers", "7", "ocp01", [
      { id: "50", href: "/providers/7/custom_attributes/50", name: "ca1", section: "metadata", value: "v1" },
      { id: "51", href: "/providers/7/custom_attributes/51", name: "ca2", section: "metadata", value: "v2" },
    ]);
  });

  it("deletes only the requested attributes that exist", async () => {
    const result = await deleteCustomAttributes(api, {
      entityType: "provider",
      entityName: "ocp01",
      attributes: [
        { name: "ca1", section: "metadata" },
        { name: "ca9", section: "metadata" },
      ],
    });

    expect(result).toEqual({
      changed: true,
      msg: "Successfully deleted the following custom attributes from ocp01 provider: ca1",
      deleted: [{ id: "50", href: "/providers/7/custom_attributes/50", name: "ca1", section: "metadata", value: "v1" }],
    });
    expect(api.writes().map((call) => call.body)).toEqual([
      { action: "delete", resources: [{ href: "/providers/7/custom_attributes/50" }] },
    ]);
    expect(api.customAttributesOf("/providers/7").map((attribute) => attribute.name)).toEqual(["ca2"]);
  });

  it("fails when the server rejects a delete", async () => {
    api.attributeDeleteResults = [{ success: false, message: "Custom attribute is locked" }];

    await expect(
      deleteCustomAttributes(api, {
        entityType: "provider",
        entityName: "ocp01",
        attributes: [{ name: "ca1", section: "metadata" }],
      }),
    ).rejects.toThrow("Failed to delete custom attributes from ocp01 provider. Error: Custom attribute is locked");
    expect(api.customAttributesOf("/providers/7")).toHaveLength(2);
  });

  it("does nothing when none of the attributes exist", async () => {
    const result = await deleteCustomAttributes(api, {
      entityType: "provider",
      entityName: "ocp01",
      attributes: [{ name: "ca1", section: "cluster" }],
    });

    expect(result).toEqual({
      changed: false,
      msg: "None of the requested custom attributes exist on ocp01 provider",
      deleted: [],
    });
    expect(api.writes()).toEqual([]);
  });
});
