export function buildChunkMetadataPrompt(productName: string): string {
  return `
You classify excerpts of the ${productName} documentation.
Return a JSON object with exactly these keys:
{
  "category": "Documentation category, for example Manual or Reference",
  "features": ["Features of ${productName} the excerpt covers"],
  "file_formats": ["File formats the excerpt discusses"],
  "version_info": "Version-specific information, or null when there is none"
}
`.trim();
}

export function buildChunkMetadataInput(sourceUrl: string, content: string): string {
  return `URL: ${sourceUrl}\n\nContent:\n${content}`;
}
