import {
  ActionRow,
  Button,
  Embed,
  Modal,
  StringSelectMenu,
  StringSelectOption,
  TextInput,
} from "seyfert";
import { ButtonStyle, TextInputStyle } from "seyfert/lib/types";
import { Emoji, UIColors } from "@/modules/ui/design-system";
import { truncate } from "../fields/list-editor";
import type { FieldLine, FormView, PromptOption, TextPrompt } from "../session";

/** Custom ids of one rendered form's controls. */
export interface ControlIds {
  previous: string;
  next: string;
  respond: string;
  finish: string;
  cancel: string;
  goTo: string;
}

export type FormRow = ActionRow<Button> | ActionRow<StringSelectMenu>;

const MAX_EMBED_FIELDS = 25;

export function colorOf(state: FormView["state"]): number {
  if (state === "canceled") return UIColors.error;
  if (state === "finished") return UIColors.success;
  return UIColors.info;
}

export function fieldHeading(line: FieldLine): string {
  const heading = line.current ? `__**${line.label}**__` : line.label;
  return line.required ? `${heading} \`*\`` : heading;
}

export function buildFormEmbed(view: FormView): Embed {
  return new Embed()
    .setTitle(truncate(view.title, 256))
    .setDescription(truncate(view.description, 4096))
    .setColor(colorOf(view.state))
    .addFields(
      view.fields.slice(0, MAX_EMBED_FIELDS).map((line) => ({
        name: truncate(fieldHeading(line), 256),
        value: truncate(line.value || "\u200b"),
      })),
    );
}

export function buildSelectOption(option: PromptOption): StringSelectOption {
  const built = new StringSelectOption()
    .setLabel(truncate(option.label, 100))
    .setValue(option.value);
  if (option.description) built.setDescription(truncate(option.description, 100));
  if (option.emoji) built.setEmoji(option.emoji);
  if (option.selected) built.setDefault(true);
  return built;
}

/** Navigation rows; terminal views get none. */
export function buildFormComponents(view: FormView, ids: ControlIds): FormRow[] {
  if (view.state !== "active") return [];

  const { controls, labels } = view;
  const navigation = new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(ids.previous)
      .setLabel(Emoji.arrow_left)
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(!controls.previous),
    new Button()
      .setCustomId(ids.respond)
      .setLabel(labels.respond)
      .setStyle(ButtonStyle.Primary)
      .setDisabled(!controls.respond),
    new Button()
      .setCustomId(ids.next)
      .setLabel(Emoji.arrow_right)
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(!controls.next),
  );
  const settle = new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(ids.finish)
      .setLabel(labels.finish)
      .setStyle(ButtonStyle.Success)
      .setDisabled(!controls.finish),
    new Button()
      .setCustomId(ids.cancel)
      .setLabel(labels.cancel)
      .setStyle(ButtonStyle.Danger)
      .setDisabled(!controls.cancel),
  );

  const rows: FormRow[] = [navigation, settle];
  if (view.goTo.length > 0) {
    rows.push(
      new ActionRow<StringSelectMenu>().addComponents(
        new StringSelectMenu()
          .setCustomId(ids.goTo)
          .setPlaceholder(labels.goTo)
          .setValuesLength({ min: 1, max: 1 })
          .setOptions(view.goTo.slice(0, 25).map(buildSelectOption)),
      ),
    );
  }
  return rows;
}

export const TEXT_INPUT_ID = "value";

export function buildPromptModal(customId: string, prompt: TextPrompt): Modal {
  const input = new TextInput()
    .setCustomId(TEXT_INPUT_ID)
    .setLabel(truncate(prompt.label, 45))
    .setStyle(prompt.style === "short" ? TextInputStyle.Short : TextInputStyle.Paragraph)
    .setRequired(prompt.required);
  if (prompt.placeholder) input.setPlaceholder(truncate(prompt.placeholder, 100));
  if (prompt.defaultValue) input.setValue(prompt.defaultValue);
  if (prompt.minLength !== undefined || prompt.maxLength !== undefined) {
    input.setLength({ min: prompt.minLength, max: prompt.maxLength });
  }

  return new Modal()
    .setCustomId(customId)
    .setTitle(truncate(prompt.title, 45))
    .addComponents(new ActionRow<TextInput>().addComponents(input));
}

/** One select per option group, `minValues`/`maxValues` clamped to the group. */
export function buildSelectRows(
  ids: readonly string[],
  groups: readonly PromptOption[][],
  placeholder: string,
  minValues: number,
  maxValues: number,
): ActionRow<StringSelectMenu>[] {
  const several = groups.length > 1;
  return groups.map((group, index) =>
    new ActionRow<StringSelectMenu>().addComponents(
      new StringSelectMenu()
        .setCustomId(ids[index])
        .setPlaceholder(truncate(placeholder, 150))
        .setValuesLength({
          min: several ? 0 : Math.min(minValues, group.length),
          max: Math.min(maxValues, group.length),
        })
        .setOptions(group.map(buildSelectOption)),
    ),
  );
}

/** Confirms a selection spread over several menus. */
export function buildSubmitRow(customId: string, label: string): ActionRow<Button> {
  return new ActionRow<Button>().addComponents(
    new Button().setCustomId(customId).setLabel(label).setStyle(ButtonStyle.Success),
  );
}
