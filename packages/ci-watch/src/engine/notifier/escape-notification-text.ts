export function escapeAppleScriptString(value: string): string {
  return value.replace(/[\\"\n]/g, (char) => (char === '\n' ? '\\n' : `\\${char}`));
}

const XML_ENTITIES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXMLString(value: string): string {
  return value.replace(/[<>&"']/g, (char) => XML_ENTITIES[char] ?? char);
}
