/**
 * Structural content: paragraphs, tables, lists, forms and linked assets.
 */
import { MIN_PARAGRAPH_LENGTH, type FormDetail, type FormField, type PageLists } from './types.js';
import { collapseWhitespace, resolveHttpUrl, uniqueInOrder } from './utils.js';

function textOf(el: Element): string {
  return collapseWhitespace(el.textContent ?? '');
}

function attributeOrNull(el: Element, name: string): string | null {
  const value = el.getAttribute(name)?.trim();
  return value || null;
}

/** Texts of <p> elements longer than MIN_PARAGRAPH_LENGTH characters. */
export function extractParagraphs(document: Document): string[] {
  const paragraphs: string[] = [];
  for (const p of document.querySelectorAll('p')) {
    const text = textOf(p);
    if (text.length > MIN_PARAGRAPH_LENGTH) paragraphs.push(text);
  }
  return paragraphs;
}

/**
 * Every table as rows of td/th texts. Rows without cells and tables
 * without rows are left out.
 */
export function extractTables(document: Document): string[][][] {
  const tables: string[][][] = [];
  for (const table of document.querySelectorAll('table')) {
    const rows: string[][] = [];
    for (const tr of table.querySelectorAll('tr')) {
      const cells = Array.from(tr.querySelectorAll('td, th'), textOf);
      if (cells.length > 0) rows.push(cells);
    }
    if (rows.length > 0) tables.push(rows);
  }
  return tables;
}

function listItems(list: Element): string[] {
  const items: string[] = [];
  for (const child of list.children) {
    if (child.nodeName.toUpperCase() !== 'LI') continue;
    const text = textOf(child);
    if (text) items.push(text);
  }
  return items;
}

/** Direct <li> texts of each <ol> and <ul>; lists with no text are left out. */
export function extractLists(document: Document): PageLists {
  const lists: PageLists = { ordered: [], unordered: [] };
  for (const list of document.querySelectorAll('ol, ul')) {
    const items = listItems(list);
    if (items.length === 0) continue;
    if (list.nodeName.toUpperCase() === 'OL') lists.ordered.push(items);
    else lists.unordered.push(items);
  }
  return lists;
}

/** Text of the label for a control: label[for=id] first, then an enclosing label. */
function labelFor(document: Document, control: Element): string | null {
  const id = control.getAttribute('id')?.trim();
  if (id) {
    for (const label of document.querySelectorAll('label[for]')) {
      if (label.getAttribute('for')?.trim() === id) return textOf(label) || null;
    }
  }
  const wrapping = control.closest('label');
  return wrapping ? textOf(wrapping) || null : null;
}

function fieldType(control: Element): string {
  const tag = control.nodeName.toLowerCase();
  if (tag !== 'input') return tag;
  return control.getAttribute('type')?.trim().toLowerCase() || 'text';
}

/** Forms with their action (resolved), method and fields in document order. */
export function extractForms(document: Document, baseUrl: string): FormDetail[] {
  const forms: FormDetail[] = [];
  for (const form of document.querySelectorAll('form')) {
    const inputs: FormField[] = [];
    for (const control of form.querySelectorAll('input, textarea, select')) {
      inputs.push({
        type: fieldType(control),
        name: attributeOrNull(control, 'name'),
        placeholder: attributeOrNull(control, 'placeholder'),
        label: labelFor(document, control),
      });
    }
    forms.push({
      action: resolveHttpUrl(form.getAttribute('action'), baseUrl),
      method: form.getAttribute('method')?.trim().toUpperCase() || 'GET',
      inputs,
    });
  }
  return forms;
}

/** URLs of external scripts, unique in document order. */
export function extractScriptSources(document: Document, baseUrl: string): string[] {
  const sources: string[] = [];
  for (const script of document.querySelectorAll('script[src]')) {
    const src = resolveHttpUrl(script.getAttribute('src'), baseUrl);
    if (src) sources.push(src);
  }
  return uniqueInOrder(sources);
}

/** URLs of <link rel="stylesheet">, unique in document order. */
export function extractStylesheets(document: Document, baseUrl: string): string[] {
  const sheets: string[] = [];
  for (const link of document.querySelectorAll('link[href]')) {
    const rel = (link.getAttribute('rel') ?? '').toLowerCase().split(/\s+/);
    if (!rel.includes('stylesheet')) continue;
    const href = resolveHttpUrl(link.getAttribute('href'), baseUrl);
    if (href) sheets.push(href);
  }
  return uniqueInOrder(sheets);
}
