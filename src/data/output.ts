/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Serialize a node for non-interactive output (--output).
*/

import { XMLBuilder } from 'fast-xml-parser';
import xmlFormat from 'xml-formatter';
import { isRecord } from './navigate';

export type OutputFormat = 'json' | 'xml';

const XML_OPTIONS = {
  attributeNamePrefix: '@_',
  ignoreAttributes: false,
  format: false,
  suppressEmptyNode: true,
};

function formatXml(xml: string): string {
  try {
    return xmlFormat(xml, {
      indentation: '  ',
      collapseContent: true,
      lineSeparator: '\n',
      whiteSpaceAtEndOfSelfclosingTag: true,
    });
  } catch {
    return xml;
  }
}

/**
 * A map with exactly one key keeps that key as the document element;
 * anything else is wrapped in `rootName` (list entries become <item>).
 */
export function toXml(node: unknown, rootName = 'root'): string {
  let doc: unknown;
  if (isRecord(node) && Object.keys(node).length === 1 && !Array.isArray(Object.values(node)[0])) {
    doc = node;
  } else if (Array.isArray(node)) {
    doc = { [rootName]: { item: node } };
  } else {
    doc = { [rootName]: node };
  }
  const xml: string = new XMLBuilder(XML_OPTIONS).build(doc);
  return formatXml(xml);
}

export function formatNode(node: unknown, format: OutputFormat): string {
  if (format === 'xml') return toXml(node);
  return JSON.stringify(node, null, 2) ?? 'null';
}
