/**
 * Form Scenario Tests.
 *
 * Purpose: whole forms driven the way a member would drive them, one button
 * press at a time.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Choice, Form, NumberField, SelectField, TextField, rules, when } from "@/modules/forms";
import { ScriptedSession, pick, typed } from "./_utils/scripted-session";
import { testContext } from "./_utils/context";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("guild name form", () => {
  it("should keep asking until the name passes every rule", async () => {
    const session = new ScriptedSession(typed("Ad"), typed("Admin"), typed("Guild"));
    const form = new Form({
      title: "Guild",
      context: testContext(),
      fields: [
        new TextField({
          name: "name",
          label: "Name",
          required: true,
          validators: [rules.minLength(3), rules.forbidden("Admin")],
        }),
      ],
    });
    await form.start(session);

    await form.respond();
    expect(form.toDict()).toEqual({ name: null });
    await form.respond();
    expect(form.toDict()).toEqual({ name: null });
    await form.respond();
    await form.finish();

    await expect(form.wait()).resolves.toBe("finished");
    expect(form.toDict()).toEqual({ name: "Guild" });
    expect(session.notices).toEqual([
      { message: "The value must be at least 3 characters long.", severity: "error" },
      { message: "The value Admin is forbidden.", severity: "error" },
      { message: "Successfully set Name to: Guild", severity: "success" },
    ]);
  });
});

describe("exchange form", () => {
  function exchangeForm() {
    return new Form({
      title: "Currency",
      context: testContext(),
      fields: [
        new SelectField<boolean>({
          name: "allow_exchange",
          label: "Allow exchange",
          required: true,
          choices: [new Choice("Yes", true), new Choice("No", false)],
        }),
        new NumberField({
          name: "exchange_rate",
          label: "Exchange rate",
          required: true,
          appear: [when("allow_exchange").equals(true)],
          validators: [rules.isNumber(), rules.minValue(0), rules.maxValue(100)],
        }),
      ],
    });
  }

  it("should reveal the rate once exchange is allowed", async () => {
    const session = new ScriptedSession(pick("Yes"), typed("150"), typed("50,5"));
    const form = exchangeForm();
    await form.start(session);
    expect(session.lastView?.fields.map((line) => line.name)).toEqual(["allow_exchange"]);

    await form.respond();
    expect(form.getCurrentField().name).toBe("exchange_rate");
    expect(session.lastView?.fields.map((line) => line.name)).toEqual([
      "allow_exchange",
      "exchange_rate",
    ]);

    await form.finish();
    expect(session.messages).toContain("Please fill out every required field first.");

    await form.respond();
    expect(session.messages).toContain("The value must be at most 100.");
    await form.respond();
    await form.finish();

    await expect(form.wait()).resolves.toBe("finished");
    expect(form.toDict()).toEqual({ allow_exchange: true, exchange_rate: 50.5 });
  });

  it("should finish without a rate when exchange is refused", async () => {
    const session = new ScriptedSession(pick("No"));
    const form = exchangeForm();
    await form.start(session);
    await form.respond();
    expect(form.getCurrentField().name).toBe("allow_exchange");
    await form.finish();
    expect(form.toDict()).toEqual({ allow_exchange: false, exchange_rate: null });
    expect(form.isFinished()).toBe(true);
  });
});
