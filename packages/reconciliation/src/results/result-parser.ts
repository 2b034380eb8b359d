/**
 * Result Parser
 *
 * Reads JUnit-style result documents (JUnit, surefire, xunit2 and the
 * like) into one ordered sequence of records per category.
 */

import { readFile } from 'node:fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  NotFoundError,
  ParseError,
  errorMessage,
  type ParsedTestResults,
  type ResultCategory,
  type TestResultRecord,
} from '@testsync/core';
import { cleanTestName, fullTestName } from '../matching/name-normalizer.js';

/** Marker elements in classification priority */
const MARKERS = [
  { element: 'failure', category: 'failed' },
  { element: 'error', category: 'error' },
  { element: 'skipped', category: 'skipped' },
] as const satisfies readonly { element: string; category: ResultCategory }[];

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

// preserveOrder keeps siblings in document order; htmlEntities also decodes
// numeric character references such as &#233;
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: TEXT_KEY,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  htmlEntities: true,
});

type XmlNode = Record<string, unknown>;

/** An element of the ordered tree: `{ [tag]: children, ':@'?: attributes }` */
interface XmlElement {
  tag: string;
  children: unknown[];
  attributes: XmlNode;
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Text nodes and anything unexpected yield undefined */
function toElement(node: unknown): XmlElement | undefined {
  if (!isNode(node)) return undefined;
  for (const [key, value] of Object.entries(node)) {
    if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
    const attributes = node[ATTRIBUTES_KEY];
    return {
      tag: key,
      children: Array.isArray(value) ? value : [],
      attributes: isNode(attributes) ? attributes : {},
    };
  }
  return undefined;
}

function attribute(element: XmlElement, name: string): string | undefined {
  const value = element.attributes[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function firstChild(element: XmlElement, tag: string): XmlElement | undefined {
  for (const child of element.children) {
    const candidate = toElement(child);
    if (candidate?.tag === tag) return candidate;
  }
  return undefined;
}

/** Text before the first child element */
function leadingText(element: XmlElement): string {
  let text = '';
  for (const child of element.children) {
    if (toElement(child)) break;
    const value = isNode(child) ? child[TEXT_KEY] : undefined;
    if (typeof value === 'string') text += value;
  }
  return text;
}

/**
 * Seconds from a `time` attribute; missing, non-numeric or negative values count as 0
 */
export function parseDuration(value: string | undefined): number {
  if (value === undefined) return 0;
  const seconds = Number(value.trim());
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

function toRecord(testcase: XmlElement): TestResultRecord {
  const classname = attribute(testcase, 'classname') ?? '';
  const name = attribute(testcase, 'name') ?? '';
  const base = {
    classname,
    name,
    fullName: fullTestName(classname, name),
    cleanName: cleanTestName(name),
    duration: parseDuration(attribute(testcase, 'time')),
  };

  for (const { element, category } of MARKERS) {
    const marker = firstChild(testcase, element);
    if (marker) {
      const record: TestResultRecord = {
        ...base,
        category,
        message: attribute(marker, 'message') ?? '',
        text: leadingText(marker),
      };
      return Object.freeze(record);
    }
  }

  const record: TestResultRecord = { ...base, category: 'passed' };
  return Object.freeze(record);
}

/** Every `testcase` at any depth, in document order */
function collectTestCases(nodes: readonly unknown[], out: XmlElement[]): void {
  for (const node of nodes) {
    const element = toElement(node);
    if (!element) continue;
    if (element.tag === 'testcase') out.push(element);
    collectTestCases(element.children, out);
  }
}

/**
 * Parse a result document held in memory
 *
 * @param source - Label used in error messages
 * @throws ParseError when the document is not well-formed or has no root element
 */
export function parseTestResultsXml(xml: string, source = 'result document'): ParsedTestResults {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError({
      message: `Error parsing XML file ${source}: ${msg} (line ${line}, column ${col})`,
      suggestion: 'Check that the file is a complete JUnit XML report.',
      context: { source, line, column: col },
    });
  }

  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (err) {
    throw new ParseError({
      message: `Error parsing XML file ${source}: ${errorMessage(err)}`,
      cause: err instanceof Error ? err : undefined,
      context: { source },
    });
  }

  const roots: unknown[] = Array.isArray(document) ? document : [];
  if (!roots.some((node) => toElement(node) !== undefined)) {
    throw new ParseError({
      message: `Error parsing XML file ${source}: no root element`,
      context: { source },
    });
  }

  const testcases: XmlElement[] = [];
  collectTestCases(roots, testcases);

  const results: Record<ResultCategory, TestResultRecord[]> = {
    passed: [],
    failed: [],
    skipped: [],
    error: [],
  };
  for (const testcase of testcases) {
    const record = toRecord(testcase);
    results[record.category].push(record);
  }

  return results;
}

/**
 * Read and parse a result document from disk
 *
 * @throws NotFoundError when the file does not exist
 * @throws ParseError when it cannot be read or parsed
 */
export async function parseTestResults(path: string): Promise<ParsedTestResults> {
  let xml: string;
  try {
    xml = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new NotFoundError({
        message: `XML file not found: ${path}`,
        suggestion: 'Check that the result file path is correct and the test run produced it.',
        context: { path },
      });
    }
    throw new ParseError({
      message: `Failed to read XML file ${path}: ${errorMessage(err)}`,
      cause: err instanceof Error ? err : undefined,
      context: { path },
    });
  }

  return parseTestResultsXml(xml, path);
}
