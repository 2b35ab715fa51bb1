import { Builder, parseStringPromise } from 'xml2js';
import { remoteRejected } from '../errors.js';

export const NSMAP = {
  vcloud: 'http://www.vmware.com/vcloud/v1.5',
  vmext: 'http://www.vmware.com/vcloud/extension/v1.5',
} as const;

/**
 * Element tree produced from an xml2js parse. Names keep their namespace
 * prefix so that a parsed document can be written back unchanged; lookups
 * go through {@link localName}.
 */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  text: string;
  children: XmlElement[];
}

/** Input accepted by the xml2js builder. */
export type XmlBuildNode = string | number | boolean | XmlBuildObject | XmlBuildNode[];
export interface XmlBuildObject {
  [key: string]: XmlBuildNode | Record<string, string> | undefined;
}

const ATTR_KEY = '$';
const CHAR_KEY = '_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

function toElement(name: string, raw: unknown): XmlElement {
  const element: XmlElement = { name, attributes: {}, text: '', children: [] };
  if (typeof raw === 'string') {
    element.text = raw;
    return element;
  }
  if (!isRecord(raw)) {
    return element;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (key === ATTR_KEY && isRecord(value)) {
      for (const [attr, attrValue] of Object.entries(value)) {
        if (typeof attrValue === 'string') {
          element.attributes[attr] = attrValue;
        }
      }
    } else if (key === CHAR_KEY && typeof value === 'string') {
      element.text = value;
    } else if (Array.isArray(value)) {
      for (const item of value) {
        element.children.push(toElement(key, item));
      }
    }
  }
  return element;
}

export async function parseXml(xml: string): Promise<XmlElement> {
  if (xml.trim() === '') {
    throw remoteRejected('Unexpected empty response from server');
  }
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml);
  } catch (xmlError) {
    throw remoteRejected(
      `Failed to parse XML response: ${xmlError instanceof Error ? xmlError.message : String(xmlError)}`
    );
  }
  if (!isRecord(parsed)) {
    throw remoteRejected('Failed to parse XML response: no root element');
  }
  const [root] = Object.entries(parsed);
  if (!root) {
    throw remoteRejected('Failed to parse XML response: no root element');
  }
  return toElement(root[0], root[1]);
}

export function findChild(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find((child) => localName(child.name) === name);
}

export function findChildren(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter((child) => localName(child.name) === name);
}

export function childText(element: XmlElement, name: string): string | undefined {
  return findChild(element, name)?.text;
}

/** Converts a parsed element back into the shape the xml2js builder takes. */
export function toBuildObject(element: XmlElement): XmlBuildNode {
  const hasAttributes = Object.keys(element.attributes).length > 0;
  if (!hasAttributes && element.children.length === 0) {
    return element.text;
  }
  const node: XmlBuildObject = {};
  if (hasAttributes) {
    node[ATTR_KEY] = { ...element.attributes };
  }
  if (element.text) {
    node[CHAR_KEY] = element.text;
  }
  for (const child of element.children) {
    const existing = node[child.name];
    const built = toBuildObject(child);
    if (Array.isArray(existing)) {
      existing.push(built);
    } else {
      node[child.name] = [built];
    }
  }
  return node;
}

/** Drops keys whose value is undefined; the builder would emit them as empty elements. */
export function compact(node: XmlBuildObject): XmlBuildObject {
  const result: XmlBuildObject = {};
  for (const [key, value] of Object.entries(node)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export function buildXml(rootName: string, root: XmlBuildNode): string {
  const builder = new Builder({
    renderOpts: { pretty: false },
    xmldec: { version: '1.0', encoding: 'UTF-8' },
  });
  return builder.buildObject({ [rootName]: root });
}
