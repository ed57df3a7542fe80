/**
 * Minimal XML helpers for the service's list and block-list payloads.
 */

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

export function decodeXml(value: string): string {
  return value.replace(/&(amp|lt|gt|quot|apos);/g, (entity) => ENTITIES[entity] ?? entity);
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Text of the first `<tag>` element, entity-decoded. Empty elements read as undefined.
 */
export function extractXmlValue(xml: string, tag: string): string | undefined {
  const match = xml.match(new RegExp(`<${tag}>([^<]*)</${tag}>`));
  return match?.[1] ? decodeXml(match[1]) : undefined;
}

/**
 * Inner XML of every `<tag>` element, in document order.
 */
export function extractXmlElements(xml: string, tag: string): string[] {
  const elements: string[] = [];
  const pattern = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, "g");
  for (const match of xml.matchAll(pattern)) {
    elements.push(match[1] ?? "");
  }
  return elements;
}

/**
 * Child elements of a `<Metadata>` block as a record with lowercased keys.
 */
export function extractXmlMetadata(xml: string): Record<string, string> {
  const metadata: Record<string, string> = {};
  const block = extractXmlElements(xml, "Metadata")[0];
  if (!block) {
    return metadata;
  }
  for (const match of block.matchAll(/<([^>\s/]+)>([^<]*)<\/\1>/g)) {
    const [, key, value] = match;
    if (key) {
      metadata[key.toLowerCase()] = decodeXml(value ?? "");
    }
  }
  return metadata;
}
