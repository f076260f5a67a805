/**
 * List Editor Unit Tests.
 *
 * Purpose: the add / remove / finish loop of aggregate fields, the nested
 * forms they open, and the info group field.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AccessRulesField,
  Form,
  FormConstructionError,
  InfosField,
  ItemType,
  RewardPackField,
  RewardType,
  StatAmountsField,
  TextField,
  emptyCluster,
  packName,
  type AccessRule,
  type ClusterLookup,
  type FieldHost,
  type ItemRef,
  type RoleRef,
  type StatRef,
} from "@/modules/forms";
import { ScriptedSession, action, pick, typed } from "./_utils/scripted-session";
import { testContext } from "./_utils/context";

const citizen: RoleRef = { id: "100", name: "Citizen" };
const merchant: RoleRef = { id: "101", name: "Merchant" };
const strength: StatRef = { id: 1, name: "Strength" };
const charisma: StatRef = { id: 2, name: "Charisma" };
const ore: ItemRef = { id: 1, name: "Iron ore", type: ItemType.Resource };

function hostOf(cluster: Partial<ClusterLookup> = {}): FieldHost {
  return { context: testContext({ cluster: { ...emptyCluster, ...cluster } }), snapshot: () => ({}), isSettled: () => false };
}

function signal(): { promise: Promise<void>; fire: () => void } {
  let fire: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    fire = resolve;
  });
  return { promise, fire };
}

/** Answers every field of the nested form in order, then finishes it. */
async function fillAndFinish(child: Form, steps: number): Promise<void> {
  for (let i = 0; i < steps; i++) await child.respond();
  await child.finish();
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("AccessRulesField", () => {
  const roles = async () => [citizen, merchant];

  it("should add one rule per picked role", async () => {
    const session = new ScriptedSession(
      action("add"),
      pick("Have access"),
      pick("Citizen", "Merchant"),
      action("finish"),
    );
    session.onChild = (child) => fillAndFinish(child, 2);
    const field = new AccessRulesField({ name: "access", label: "Access rules" });
    field.attach(hostOf({ roles }));
    await field.ask(session);

    expect(field.value).toEqual([
      { role: citizen, haveAccess: true },
      { role: merchant, haveAccess: true },
    ]);
    expect(field.displayValue).toBe("✅ Citizen\n✅ Merchant");
    expect(session.children.map((child) => child.title)).toEqual(["Add an access rule"]);
  });

  it("should only offer roles without a rule", async () => {
    const session = new ScriptedSession(action("add"), action("finish"));
    const field = new AccessRulesField({
      name: "access",
      label: "Access rules",
      defaultValue: [
        { role: citizen, haveAccess: true },
        { role: merchant, haveAccess: false },
      ],
    });
    field.attach(hostOf({ roles }));
    await field.ask(session);

    expect(session.children).toEqual([]);
    expect(session.notices[0]).toEqual({
      message: "Every role already has a rule.",
      severity: "info",
    });
    expect(field.displayValue).toBe("✅ Citizen\n❌ Merchant");
  });

  it("should remove the picked entries", async () => {
    const rules: AccessRule[] = [
      { role: citizen, haveAccess: true },
      { role: merchant, haveAccess: false },
    ];
    const session = new ScriptedSession(action("remove"), pick("✅ Citizen"), action("finish"));
    const field = new AccessRulesField({ name: "access", label: "Access rules", defaultValue: rules });
    field.attach(hostOf({ roles }));
    await field.ask(session);

    expect(field.value).toEqual([{ role: merchant, haveAccess: false }]);
    const removal = session.prompts[1];
    expect(removal?.kind === "select" && removal.description).toBe("Select the entries to remove.");
  });

  it("should keep the value until the editor is finished", async () => {
    const session = new ScriptedSession(action("add"), pick("Have access"), pick("Citizen"));
    session.onChild = (child) => fillAndFinish(child, 2);
    const field = new AccessRulesField({ name: "access", label: "Access rules" });
    field.attach(hostOf({ roles }));

    await expect(field.ask(session)).resolves.toBe(false);
    expect(field.value).toBeNull();
    expect(field.displayValue).toBe("*Unanswered*");
  });

  it("should offer remove only when there are entries", async () => {
    const session = new ScriptedSession(action("finish"));
    const field = new AccessRulesField({ name: "access", label: "Access rules" });
    field.attach(hostOf({ roles }));
    await field.ask(session);

    const menu = session.prompts[0];
    expect(menu?.kind === "action" && menu.actions.map((option) => option.value)).toEqual([
      "add",
      "finish",
    ]);
    expect(menu?.kind === "action" && menu.description).toBe("*No access rules*");
    expect(field.value).toEqual([]);
  });

  it("should ignore a canceled nested form", async () => {
    const session = new ScriptedSession(action("add"), action("finish"));
    session.onChild = (child) => child.cancel();
    const field = new AccessRulesField({ name: "access", label: "Access rules" });
    field.attach(hostOf({ roles }));
    await field.ask(session);
    expect(field.value).toEqual([]);
  });
});

describe("AccessRulesField limits", () => {
  it("should offer at most 100 entries for removal", async () => {
    const many: AccessRule[] = Array.from({ length: 120 }, (_, i) => ({
      role: { id: String(i), name: `Role ${i}` },
      haveAccess: true,
    }));
    const session = new ScriptedSession(action("remove"), pick("✅ Role 0"), action("finish"));
    const field = new AccessRulesField({ name: "access", label: "Access rules", defaultValue: many });
    field.attach(hostOf());
    await field.ask(session);

    const removal = session.prompts[1];
    expect(removal?.kind === "select" && removal.groups.flat()).toHaveLength(100);
    expect(removal?.kind === "select" && removal.maxValues).toBe(100);
    expect(field.value).toHaveLength(119);
  });

  it("should stop editing when the owning form is canceled", async () => {
    const opened = signal();
    const session = new ScriptedSession(action("add"));
    session.onChild = async () => opened.fire();
    const field = new AccessRulesField({ name: "access", label: "Access rules" });
    const form = new Form({
      title: "Parent",
      fields: [field],
      context: testContext({ cluster: { ...emptyCluster, roles: async () => [citizen] } }),
    });
    await form.start(session);

    const responding = form.respond();
    await opened.promise;
    await form.cancel();
    await responding;

    expect(session.children[0]?.status).toBe("canceled");
    expect(session.prompts).toHaveLength(1);
    expect(field.value).toBeNull();
  });
});

describe("StatAmountsField", () => {
  it("should add a signed amount for a stat", async () => {
    const session = new ScriptedSession(
      action("add"),
      pick("Strength"),
      typed("-2"),
      action("add"),
      pick("Charisma"),
      typed("3"),
      action("finish"),
    );
    session.onChild = (child) => fillAndFinish(child, 2);
    const field = new StatAmountsField({ name: "stats", label: "Stats" });
    field.attach(hostOf({ stats: async () => [strength, charisma] }));
    await field.ask(session);

    expect(field.value).toEqual([
      { stat: strength, amount: -2 },
      { stat: charisma, amount: 3 },
    ]);
    expect(field.displayValue).toBe("Strength: -2\nCharisma: +3");
  });

  it("should not offer a stat twice", async () => {
    const session = new ScriptedSession(action("add"), action("finish"));
    const field = new StatAmountsField({
      name: "stats",
      label: "Stats",
      defaultValue: [{ stat: strength, amount: 1 }],
    });
    field.attach(hostOf({ stats: async () => [strength] }));
    await field.ask(session);
    expect(session.notices[0]?.message).toBe("Every stat is already listed.");
  });
});

describe("RewardPackField", () => {
  const cluster: Partial<ClusterLookup> = {
    items: async () => [ore],
    stats: async () => [strength],
    roles: async () => [citizen],
  };

  it("should name packs by luck and type", () => {
    expect(packName({ type: null, luck: 50 })).toBe("50 %");
    expect(packName({ type: RewardType.Equip, luck: 100 })).toBe(
      "100 % - Equip (when equipped to the hotbar)",
    );
  });

  it("should add an item reward with an amount range", async () => {
    const session = new ScriptedSession(
      action("add"),
      pick("Item (or currency)"),
      pick("Iron ore"),
      typed("2"),
      typed("5"),
      action("finish"),
    );
    session.onChild = (child) => fillAndFinish(child, 4);
    const field = new RewardPackField({
      name: "rewards",
      label: "Rewards",
      packType: RewardType.Passive,
    });
    field.attach(hostOf(cluster));
    await field.ask(session);

    expect(field.value).toEqual({
      type: RewardType.Passive,
      luck: 100,
      rewards: [{ kind: "item", target: ore, minAmount: 2, maxAmount: 5 }],
    });
    expect(field.displayValue).toBe("**100 % - Passive (when owned)**\nx2-5 Iron ore");
  });

  it("should add a role reward without amounts", async () => {
    const session = new ScriptedSession(
      action("add"),
      pick("RP Role"),
      pick("Citizen"),
      action("finish"),
    );
    session.onChild = (child) => fillAndFinish(child, 2);
    const field = new RewardPackField({ name: "rewards", label: "Rewards", luck: 25 });
    field.attach(hostOf(cluster));
    await field.ask(session);

    expect(field.value).toEqual({
      type: null,
      luck: 25,
      rewards: [{ kind: "role", target: citizen, minAmount: 1, maxAmount: null }],
    });
    expect(field.displayValue).toBe("**25 %**\nx1 @Citizen");
  });

  it("should refuse a minimum above the maximum", async () => {
    const session = new ScriptedSession(
      action("add"),
      pick("Stat"),
      pick("Strength"),
      typed("5"),
      typed("2"),
      action("finish"),
    );
    session.onChild = (child) => fillAndFinish(child, 4);
    const field = new RewardPackField({ name: "rewards", label: "Rewards" });
    field.attach(hostOf(cluster));
    await field.ask(session);

    expect(session.notices).toContainEqual({
      message: "Minimum amount can't be greater than maximum amount.",
      severity: "error",
    });
    expect(field.value).toEqual({ type: null, luck: 100, rewards: [] });
  });

  it("should only offer reward kinds the cluster has", async () => {
    const session = new ScriptedSession(action("add"), action("finish"));
    session.onChild = (child) => child.cancel();
    const field = new RewardPackField({ name: "rewards", label: "Rewards" });
    field.attach(hostOf({ stats: async () => [strength] }));
    await field.ask(session);

    const kind = session.children[0]?.fields[0];
    expect(kind?.name).toBe("kind");
    await expect(kind?.ask(session)).resolves.toBe(false);
    const menu = session.prompts[session.prompts.length - 1];
    expect(menu?.kind === "select" && menu.groups[0].map((option) => option.label)).toEqual([
      "Stat",
    ]);
  });

  it("should report when nothing can be rewarded", async () => {
    const session = new ScriptedSession(action("add"), action("finish"));
    const field = new RewardPackField({ name: "rewards", label: "Rewards" });
    field.attach(hostOf());
    await field.ask(session);
    expect(session.notices[0]).toEqual({
      message: "There are no rewards available to add (role, item or stat).",
      severity: "info",
    });
  });

  it("should set luck and type through a nested form", async () => {
    const session = new ScriptedSession(
      action("settings"),
      typed("33,333"),
      pick("Active (when used)"),
      action("finish"),
    );
    session.onChild = (child) => fillAndFinish(child, 2);
    const field = new RewardPackField({ name: "rewards", label: "Rewards" });
    field.attach(hostOf(cluster));
    await field.ask(session);

    const menu = session.prompts[0];
    expect(menu?.kind === "action" && menu.actions.map((option) => option.value)).toEqual([
      "add",
      "settings",
      "delete",
      "finish",
    ]);
    expect(field.value).toEqual({ type: RewardType.Active, luck: 33.33, rewards: [] });
    expect(field.displayValue).toBe("**33.33 % - Active (when used)**\n*No rewards*");
  });

  it("should refuse a luck above 100", async () => {
    const session = new ScriptedSession(action("settings"), typed("150"), action("finish"));
    session.onChild = async (child) => {
      await child.respond();
      await child.cancel();
    };
    const field = new RewardPackField({ name: "rewards", label: "Rewards" });
    field.attach(hostOf(cluster));
    await field.ask(session);

    expect(session.notices).toContainEqual({
      message: "The value must be at most 100.",
      severity: "error",
    });
    expect(field.value).toEqual({ type: null, luck: 100, rewards: [] });
  });

  it("should only ask for luck when no type is offered", async () => {
    const session = new ScriptedSession(action("settings"), typed("50"), action("finish"));
    session.onChild = (child) => fillAndFinish(child, 1);
    const field = new RewardPackField({ name: "rewards", label: "Rewards", types: [] });
    field.attach(hostOf(cluster));
    await field.ask(session);

    expect(session.children[0]?.fields.map((child) => child.name)).toEqual(["luck"]);
    expect(field.value).toEqual({ type: null, luck: 50, rewards: [] });
  });

  it("should delete the whole pack", async () => {
    const session = new ScriptedSession(action("delete"));
    const field = new RewardPackField({
      name: "rewards",
      label: "Rewards",
      defaultValue: { type: null, luck: 100, rewards: [] },
    });
    field.attach(hostOf(cluster));
    await field.ask(session);

    expect(field.value).toBeNull();
    expect(session.notices).toEqual([
      { message: "The reward pack has been deleted.", severity: "success" },
    ]);
  });
});

describe("InfosField", () => {
  function details() {
    return new InfosField({
      name: "infos",
      label: "Details",
      fields: [
        new TextField({ name: "motto", label: "Motto" }),
        new TextField({ name: "history", label: "History" }),
      ],
    });
  }

  it("should keep the answered entries of the nested form", async () => {
    const session = new ScriptedSession(typed("Onward"));
    session.onChild = (child) => fillAndFinish(child, 1);
    const field = details();
    field.attach(hostOf());
    await field.ask(session);

    expect(field.value).toEqual([{ key: "motto", value: "Onward" }]);
    expect(field.displayValue).toBe("**Motto**: Onward");
  });

  it("should leave the value alone when the nested form is canceled", async () => {
    const session = new ScriptedSession();
    session.onChild = (child) => child.cancel();
    const field = details();
    field.attach(hostOf());

    await expect(field.ask(session)).resolves.toBe(false);
    expect(field.value).toBeNull();
    expect(session.notices).toEqual([
      { message: "The field **Details** has not been updated.", severity: "info" },
    ]);
  });

  it("should drop empty answers", async () => {
    const session = new ScriptedSession();
    session.onChild = (child) => fillAndFinish(child, 0);
    const field = new InfosField({
      name: "infos",
      label: "Details",
      fields: [new TextField({ name: "motto", label: "Motto", defaultValue: "" })],
    });
    field.attach(hostOf());
    await field.ask(session);

    expect(field.value).toEqual([]);
    expect(field.displayValue).toBe("*Unanswered*");
  });

  it("should refuse an empty group", () => {
    expect(() => new InfosField({ name: "infos", label: "Details", fields: [] })).toThrow(
      FormConstructionError,
    );
  });

  it("should close the nested form when the owning form is canceled", async () => {
    const opened = signal();
    const session = new ScriptedSession();
    session.onChild = async () => opened.fire();
    const form = new Form({ title: "Parent", fields: [details()], context: testContext() });
    await form.start(session);

    const responding = form.respond();
    await opened.promise;
    await form.cancel();
    await responding;

    expect(form.status).toBe("canceled");
    expect(session.children[0]?.status).toBe("canceled");
    expect(session.messages).not.toContain("The field **Details** has not been updated.");
  });

  it("should be incomplete while a required child is missing", () => {
    const field = new InfosField({
      name: "infos",
      label: "Details",
      required: true,
      fields: [new TextField({ name: "motto", label: "Motto", required: true })],
    });
    expect(field.isCompleted()).toBe(false);
  });
});
