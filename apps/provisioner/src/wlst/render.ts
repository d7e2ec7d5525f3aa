import type { DomainStep, WlstValue } from "../domain/weblogic-domain/types.js";

/**
 * Quote a string as a single-quoted WLST (Jython) literal.
 */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "\\'")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n");
  return `'${escaped}'`;
}

function renderValue(value: WlstValue): string {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "string") {
    return quote(value);
  }
  return `os.environ[${quote(value.secret)}]`;
}

export function renderStep(step: DomainStep): string {
  switch (step.op) {
    case "selectTemplate":
      return `selectTemplate(${quote(step.template)})`;
    case "loadTemplates":
      return "loadTemplates()";
    case "cd":
      return `cd(${quote(step.path)})`;
    case "set":
      return `set(${quote(step.attribute)}, ${renderValue(step.value)})`;
    case "setOption":
      return `setOption(${quote(step.option)}, ${quote(step.value)})`;
    case "create":
      return `create(${quote(step.name)}, ${quote(step.type)})`;
    case "writeDomain":
      return `writeDomain(${quote(step.path)})`;
    case "closeTemplate":
      return "closeTemplate()";
    case "exit":
      return "exit()";
  }
}

// Jython 2 rejects non-ASCII source without an encoding declaration
const CODING_LINE = "# -*- coding: utf-8 -*-";

/**
 * Render a plan as an offline WLST script. Secrets stay in the environment
 * of the WLST process; the script only names them.
 */
export function renderWlstScript(plan: DomainStep[]): string {
  return [CODING_LINE, "import os", "", ...plan.map(renderStep), ""].join("\n");
}
