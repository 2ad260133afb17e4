/**
 * Parser for `qstat -x` output
 *
 * Every <Job> element, at any depth, becomes one JobRecord. Child elements
 * with further structure become nested records; text-only children become
 * strings; empty children are skipped.
 */

import { DOMParser, type Element, type Node } from '@xmldom/xmldom';
import { ParseError, describeError } from './errors.js';
import type { JobField, JobRecord } from './types.js';

const JOB_TAG = 'Job';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

/**
 * Parse the XML document printed by `qstat -x` into job records,
 * in document order.
 */
export function parseJobRecords(xml: string): JobRecord[] {
  const doc = readDocument(xml);
  const jobs = doc.getElementsByTagName(JOB_TAG);
  const records: JobRecord[] = [];
  for (let i = 0; i < jobs.length; i++) {
    const job = jobs.item(i);
    if (job) {
      records.push(parseFields(job));
    }
  }
  return records;
}

function readDocument(xml: string) {
  const problems: string[] = [];
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level !== 'warning') {
        problems.push(message);
      }
    },
  });

  try {
    const doc = parser.parseFromString(xml, 'text/xml');
    if (problems.length > 0) {
      throw new ParseError(`Malformed qstat output: ${problems[0]}`);
    }
    if (!doc.documentElement) {
      throw new ParseError('Malformed qstat output: no root element');
    }
    return doc;
  } catch (err) {
    if (err instanceof ParseError) throw err;
    throw new ParseError(`Malformed qstat output: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Convert the element children of `element` into a field mapping.
 * Later siblings overwrite earlier ones with the same name.
 */
function parseFields(element: Element): JobRecord {
  const fields: Record<string, JobField> = {};

  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (!child || !isElement(child)) continue;

    const value = parseValue(child);
    if (value !== null) {
      fields[normalizeName(child.tagName)] = value;
    }
  }

  return fields;
}

function parseValue(element: Element): JobField | null {
  let text: string | null = null;

  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (!child) continue;
    if (isElement(child)) {
      return parseFields(element);
    }
    if (isText(child)) {
      text = (text ?? '') + (child.nodeValue ?? '');
    }
  }

  return text;
}

function normalizeName(name: string): string {
  return name.toLowerCase();
}
