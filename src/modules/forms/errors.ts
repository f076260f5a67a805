import { formatMessage, type MessageVars, type Translate } from "./i18n";

/**
 * Raised by a validator when a value is rejected. Keeps the untranslated
 * template so the field can render it through the form's translator.
 */
export class ValidationError extends Error {
  readonly name = "ValidationError";

  constructor(
    readonly template: string,
    readonly vars: MessageVars = {},
  ) {
    super(formatMessage(template, vars));
  }

  translate(translate: Translate): string {
    return translate(this.template, this.vars);
  }
}

/** Contract violations detected while a form or field is being built. */
export class FormConstructionError extends Error {
  readonly name = "FormConstructionError";
}
