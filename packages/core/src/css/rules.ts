/**
 * packages/core/src/css/rules.ts — Nested rule DSL for the static stylesheet.
 *
 * A SheetClass owns declarations for its selector plus nested blocks for
 * children, descendants, compound descriptors and adjacent siblings. Each
 * selector renders to one single-line block, parent first.
 */

import type { Property } from "../style/types.js";
import { block } from "./render.js";

export type Rule =
  | Readonly<{ kind: "prop"; key: string; value: string }>
  | Readonly<{ kind: "child"; selector: string; rules: readonly Rule[] }>
  | Readonly<{ kind: "allChildren"; selector: string; rules: readonly Rule[] }>
  | Readonly<{ kind: "descriptor"; selector: string; rules: readonly Rule[] }>
  | Readonly<{ kind: "adjacent"; selector: string; rules: readonly Rule[] }>
  | Readonly<{ kind: "supports"; condition: Property; props: readonly Property[] }>
  | Readonly<{ kind: "batch"; rules: readonly Rule[] }>;

export type SheetClass = Readonly<{ selector: string; rules: readonly Rule[] }>;

export function cls(selector: string, rules: readonly Rule[]): SheetClass {
  return { selector, rules };
}

export function prop(key: string, value: string): Rule {
  return { kind: "prop", key, value };
}

export function child(selector: string, rules: readonly Rule[]): Rule {
  return { kind: "child", selector, rules };
}

export function allChildren(selector: string, rules: readonly Rule[]): Rule {
  return { kind: "allChildren", selector, rules };
}

export function descriptor(selector: string, rules: readonly Rule[]): Rule {
  return { kind: "descriptor", selector, rules };
}

export function adjacent(selector: string, rules: readonly Rule[]): Rule {
  return { kind: "adjacent", selector, rules };
}

export function supports(condition: readonly [string, string], props: readonly (readonly [string, string])[]): Rule {
  return {
    kind: "supports",
    condition: { key: condition[0], value: condition[1] },
    props: props.map(([key, value]) => ({ key, value })),
  };
}

export function batch(rules: readonly Rule[]): Rule {
  return { kind: "batch", rules };
}

function renderRules(selector: string, rules: readonly Rule[], out: string[]): void {
  const props: Property[] = [];
  const nested: string[] = [];
  const walk = (list: readonly Rule[]): void => {
    for (const rule of list) {
      switch (rule.kind) {
        case "prop":
          props.push({ key: rule.key, value: rule.value });
          break;
        case "child":
          renderRules(`${selector} > ${rule.selector}`, rule.rules, nested);
          break;
        case "allChildren":
          renderRules(`${selector} ${rule.selector}`, rule.rules, nested);
          break;
        case "descriptor":
          renderRules(`${selector}${rule.selector}`, rule.rules, nested);
          break;
        case "adjacent":
          renderRules(`${selector} + ${rule.selector}`, rule.rules, nested);
          break;
        case "supports":
          nested.push(
            `@supports (${rule.condition.key}:${rule.condition.value}) { ${block(selector, rule.props)} }`,
          );
          break;
        case "batch":
          walk(rule.rules);
          break;
      }
    }
  };
  walk(rules);
  if (props.length > 0) out.push(block(selector, props));
  out.push(...nested);
}

export function renderSheet(classes: readonly SheetClass[]): string {
  const out: string[] = [];
  for (const c of classes) renderRules(c.selector, c.rules, out);
  return out.join("\n");
}
