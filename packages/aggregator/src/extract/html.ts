import { parse, type HTMLElement } from "node-html-parser";

import { normaliseWhitespace } from "./text.js";

export type { HTMLElement };

export function parseDocument(html: string) {
  const root = parse(html);
  for (const node of root.querySelectorAll("script,style,noscript")) {
    node.remove();
  }
  return root;
}

export function textOf(node: HTMLElement | null | undefined) {
  return node ? normaliseWhitespace(node.text) : "";
}

export function getMetaContent(root: HTMLElement, selector: string, attr: string) {
  const node = root.querySelector(selector);
  if (!node) return null;
  const value = node.getAttribute(attr);
  return value ? value.trim() : null;
}

export function resolveUrl(href: string, baseUrl: string) {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

export function firstMatching(root: HTMLElement, selectors: readonly string[]) {
  for (const selector of selectors) {
    const node = root.querySelector(selector);
    if (node) {
      return node;
    }
  }
  return null;
}
