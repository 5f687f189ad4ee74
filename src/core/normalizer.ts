import { parseHTML } from 'linkedom';
import type { EntityRecord, ManagerRecord } from '../domain/models.js';
import { ParseError, SiteChangedError } from '../utils/error-handler.js';
import { collapseWhitespace, joinAddressLines, normalizeLabel, singularize, titleCase } from '../utils/text.js';

type FieldKey = 'name' | 'address' | 'status';

const FIELD_KEYS: readonly FieldKey[] = ['name', 'address', 'status'];

const FIELD_LABELS: Record<FieldKey, readonly string[]> = {
  name: ['entity name', 'business name', 'llc name', 'company name', 'name'],
  address: ['principal office', 'principal office address', 'principal address', 'business address', 'address'],
  status: ['status', 'entity status']
};

const MANAGER_NAME_COLUMNS: readonly string[] = ['name', 'manager name', 'member name', 'officer name'];
const MANAGER_ROLE_COLUMNS: readonly string[] = ['role', 'title', 'position', 'type'];

const BLOCK_TAGS = new Set(['p', 'div', 'li', 'tr', 'dd', 'dt', 'address']);
const HEADING_TAGS = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'caption', 'legend']);

interface RawManagerRow {
  nameLines: string[];
  addressLines: string[];
  role: string;
}

interface RawEntityFields {
  template: string;
  fields: Partial<Record<FieldKey, string[]>>;
  managers: RawManagerRow[];
}

interface ResultsTemplate {
  name: string;
  collectFields(document: Document, managerTables: ReadonlySet<Element>): Partial<Record<FieldKey, string[]>>;
}

function tagOf(element: Element): string {
  return element.tagName.toLowerCase();
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

/** Text of an element split into lines at <br> and block boundaries. */
function elementLines(element: Element): string[] {
  const lines: string[] = [];
  let current = '';

  const flush = () => {
    const line = collapseWhitespace(current);
    if (line) lines.push(line);
    current = '';
  };

  const walk = (node: Node) => {
    for (const child of Array.from(node.childNodes)) {
      if (isElement(child)) {
        const tag = tagOf(child);
        if (tag === 'br') {
          flush();
        } else if (BLOCK_TAGS.has(tag)) {
          flush();
          walk(child);
          flush();
        } else {
          walk(child);
        }
      } else if (child.nodeType === 3) {
        current += child.textContent ?? '';
      }
    }
  };

  walk(element);
  flush();
  return lines;
}

function fieldForLabel(label: string): FieldKey | null {
  return FIELD_KEYS.find(key => FIELD_LABELS[key].includes(label)) ?? null;
}

function assignField(fields: Partial<Record<FieldKey, string[]>>, label: string, lines: string[]): void {
  const key = fieldForLabel(normalizeLabel(label));
  // First occurrence wins; detail pages repeat "Name" in later sections
  if (key && lines.length > 0 && !fields[key]) {
    fields[key] = lines;
  }
}

const labelledTable: ResultsTemplate = {
  name: 'labelled-table',
  collectFields(document, managerTables) {
    const fields: Partial<Record<FieldKey, string[]>> = {};
    for (const row of Array.from(document.querySelectorAll('tr'))) {
      const table = row.closest('table');
      if (table && managerTables.has(table)) continue;

      const cells = Array.from(row.children).filter(cell => tagOf(cell) === 'td' || tagOf(cell) === 'th');
      if (cells.length !== 2 || tagOf(cells[1]) !== 'td') continue;
      assignField(fields, cells[0].textContent ?? '', elementLines(cells[1]));
    }
    return fields;
  }
};

const definitionList: ResultsTemplate = {
  name: 'definition-list',
  collectFields(document) {
    const fields: Partial<Record<FieldKey, string[]>> = {};
    for (const list of Array.from(document.querySelectorAll('dl'))) {
      let label: string | null = null;
      for (const child of Array.from(list.children)) {
        if (tagOf(child) === 'dt') {
          label = child.textContent ?? '';
        } else if (tagOf(child) === 'dd' && label !== null) {
          assignField(fields, label, elementLines(child));
          label = null;
        }
      }
    }
    return fields;
  }
};

const TEMPLATES: readonly ResultsTemplate[] = [labelledTable, definitionList];

interface ManagerColumns {
  name: number;
  address: number;
  role: number;
}

function headerColumns(table: Element): { header: Element; columns: ManagerColumns } | null {
  for (const row of Array.from(table.querySelectorAll('tr'))) {
    const cells = Array.from(row.children);
    if (cells.length === 0 || !cells.every(cell => tagOf(cell) === 'th')) continue;

    const labels = cells.map(cell => normalizeLabel(cell.textContent ?? ''));
    const name = labels.findIndex(label => MANAGER_NAME_COLUMNS.includes(label));
    const address = labels.findIndex(label => label.includes('address'));
    const role = labels.findIndex(label => MANAGER_ROLE_COLUMNS.includes(label));
    if (name >= 0 && address >= 0) {
      return { header: row, columns: { name, address, role } };
    }
    return null;
  }
  return null;
}

/** Role implied by the section a table sits in, e.g. "Managers" -> "Manager". */
function sectionRole(table: Element): string {
  const captionText = table.querySelector('caption')?.textContent?.trim();
  if (captionText) {
    return roleFromHeading(captionText);
  }

  let anchor: Element | null = table;
  // Tables are often wrapped once in a section or div
  for (let depth = 0; depth < 2 && anchor; depth++) {
    let sibling: Element | null = anchor.previousElementSibling;
    while (sibling) {
      if (HEADING_TAGS.has(tagOf(sibling))) {
        return roleFromHeading(sibling.textContent ?? '');
      }
      sibling = sibling.previousElementSibling;
    }
    anchor = anchor.parentElement;
  }
  return '';
}

function roleFromHeading(heading: string): string {
  const words = collapseWhitespace(heading).split(' ').filter(Boolean);
  if (words.length === 0) return '';
  words[words.length - 1] = singularize(words[words.length - 1]);
  return titleCase(words.join(' '));
}

function collectManagers(document: Document): { tables: Set<Element>; rows: RawManagerRow[] } {
  const tables = new Set<Element>();
  const rows: RawManagerRow[] = [];

  for (const table of Array.from(document.querySelectorAll('table'))) {
    const detected = headerColumns(table);
    if (!detected) continue;
    tables.add(table);

    const { header, columns } = detected;
    const fallbackRole = sectionRole(table);
    for (const row of Array.from(table.querySelectorAll('tr'))) {
      if (row === header) continue;
      const cells = Array.from(row.children).filter(cell => tagOf(cell) === 'td');
      const nameCell = cells[columns.name];
      if (!nameCell) continue;

      const nameLines = elementLines(nameCell);
      if (nameLines.length === 0) continue;

      const addressCell = cells[columns.address];
      const roleCell = columns.role >= 0 ? cells[columns.role] : undefined;
      rows.push({
        nameLines,
        addressLines: addressCell ? elementLines(addressCell) : [],
        role: roleCell ? collapseWhitespace(roleCell.textContent ?? '') : fallbackRole
      });
    }
  }

  return { tables, rows };
}

function extractRaw(document: Document): RawEntityFields | null {
  const managers = collectManagers(document);
  for (const template of TEMPLATES) {
    const fields = template.collectFields(document, managers.tables);
    if (Object.keys(fields).length > 0) {
      return { template: template.name, fields, managers: managers.rows };
    }
  }
  return null;
}

/** True when the page matches one of the known results layouts. */
export function looksLikeResults(html: string): boolean {
  const { document } = parseHTML(html);
  return extractRaw(document) !== null;
}

/**
 * Turns a registry results page into an EntityRecord.
 *
 * Pure: the same HTML always yields an identical record. Fails with
 * SiteChangedError when no known layout matches and with ParseError when a
 * recognised page has no business name.
 */
export function normalize(html: string): EntityRecord {
  const { document } = parseHTML(html);
  const raw = extractRaw(document);
  if (!raw) {
    throw new SiteChangedError('Results page matches no known layout', {
      templates: TEMPLATES.map(t => t.name)
    });
  }

  const businessName = collapseWhitespace((raw.fields.name ?? []).join(' '));
  if (!businessName) {
    throw new ParseError('Business name missing from results page', { template: raw.template });
  }

  const managers: ManagerRecord[] = raw.managers.map(row => Object.freeze({
    name: collapseWhitespace(row.nameLines.join(' ')),
    address: joinAddressLines(row.addressLines),
    role: row.role ? titleCase(row.role) : ''
  }));

  return Object.freeze({
    businessName,
    businessAddress: joinAddressLines(raw.fields.address ?? []),
    status: collapseWhitespace((raw.fields.status ?? []).join(' ')).toUpperCase(),
    managers: Object.freeze(managers)
  });
}
