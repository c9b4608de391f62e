// apps/api/src/auth/policy.test.ts
import assert from "node:assert";
import { test } from "node:test";
import { ApiError } from "../common/errors";
import { authorize, capabilitiesOf, OPERATIONS, requireCapability, ROLES } from "./policy";

test("each role holds exactly its capabilities", () => {
  assert.deepEqual(capabilitiesOf("manager"), [
    "view",
    "create",
    "update",
    "delete",
    "browse",
    "view_ledger",
    "export_ledger",
    "manage_categories",
  ]);
  assert.deepEqual(capabilitiesOf("purchase_manager"), [
    "record_purchase",
    "bulk_record",
    "browse",
    "view_ledger",
    "export_ledger",
  ]);
  assert.deepEqual(capabilitiesOf("kitchen_manager"), ["transfer", "browse", "view_ledger", "export_ledger"]);
});

test("kitchen_manager may never delete", () => {
  assert.deepEqual(authorize("kitchen_manager", "delete"), {
    allowed: false,
    reason: "Role kitchen_manager may not delete",
  });
});

test("stock-changing operations belong to one role each", () => {
  const owners = (op: (typeof OPERATIONS)[number]) => ROLES.filter((r) => authorize(r, op).allowed);
  assert.deepEqual(owners("create"), ["manager"]);
  assert.deepEqual(owners("record_purchase"), ["purchase_manager"]);
  assert.deepEqual(owners("bulk_record"), ["purchase_manager"]);
  assert.deepEqual(owners("transfer"), ["kitchen_manager"]);
  assert.deepEqual(owners("manage_categories"), ["manager"]);
});

test("requireCapability throws a 403 Denied", () => {
  assert.doesNotThrow(() => requireCapability({ role: "manager" }, "delete"));
  assert.throws(
    () => requireCapability({ role: "purchase_manager" }, "transfer"),
    (err: unknown) => err instanceof ApiError && err.statusCode === 403 && err.code === "Denied"
  );
});
