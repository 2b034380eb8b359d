/**
 * Test step extraction from the `Microsoft.VSTS.TCM.Steps` work item field.
 *
 * The field is an XML document whose `parameterizedString` nodes hold
 * HTML-escaped rich text: the first is the action, the second the
 * expected result. Shared-step references (`compref`) may nest steps.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { TestStep } from '@testsync/core';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  htmlEntities: true,
  isArray: (name) => name === 'step' || name === 'parameterizedString' || name === 'compref',
});

// Entities left in the rich text once the XML layer is decoded
const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromCodePoint(code: number): string | undefined {
  return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : undefined;
}

/**
 * Strip markup from a rich-text fragment and collapse whitespace
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, ' ')
    .replace(/<[^>]*>/g, ' ')
    .replace(/&#(\d{1,7});/g, (entity, code: string) => fromCodePoint(Number.parseInt(code, 10)) ?? entity)
    .replace(/&#x([0-9a-f]{1,6});/gi, (entity, code: string) => fromCodePoint(Number.parseInt(code, 16)) ?? entity)
    .replace(/&(nbsp|amp|lt|gt|quot);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

function nodeText(node: unknown): string {
  if (typeof node === 'string') return node;
  if (isObject(node)) {
    const text = node['#text'];
    return typeof text === 'string' ? text : '';
  }
  return '';
}

function attribute(node: Record<string, unknown>, name: string): string {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : '';
}

function collectSteps(node: unknown, out: TestStep[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectSteps(item, out);
    return;
  }
  if (!isObject(node)) return;

  for (const [key, value] of Object.entries(node)) {
    if (key === 'step' && Array.isArray(value)) {
      for (const step of value) {
        if (!isObject(step)) continue;
        const strings = Array.isArray(step['parameterizedString'])
          ? step['parameterizedString']
          : [];
        out.push({
          id: attribute(step, 'id'),
          type: attribute(step, 'type'),
          action: htmlToText(nodeText(strings[0])),
          expected: htmlToText(nodeText(strings[1])),
        });
      }
    } else if (!key.startsWith('@_') && key !== '#text') {
      collectSteps(value, out);
    }
  }
}

/**
 * Parse the steps field. Empty or malformed input yields no steps.
 */
export function parseTestSteps(stepsXml: string | undefined): TestStep[] {
  if (!stepsXml || !stepsXml.trim()) return [];
  if (XMLValidator.validate(stepsXml) !== true) return [];

  const steps: TestStep[] = [];
  collectSteps(parser.parse(stepsXml), steps);
  return steps;
}
