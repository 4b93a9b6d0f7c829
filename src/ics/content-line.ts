export interface ContentLine {
  name: string;
  params: Record<string, string>;
  value: string;
}

export function unfoldLines(icsText: string): string[] {
  const rawLines = icsText.replace(/\r\n/g, "\n").replace(/\r/g, "\n").split("\n");
  const lines: string[] = [];

  for (const rawLine of rawLines) {
    if ((rawLine.startsWith(" ") || rawLine.startsWith("\t")) && lines.length > 0) {
      lines[lines.length - 1] += rawLine.slice(1);
      continue;
    }
    lines.push(rawLine);
  }

  return lines;
}

/**
 * Splits `NAME;PARAM=value;PARAM="quoted:value":content`. Separators inside
 * double quotes belong to the parameter value.
 */
export function parseContentLine(line: string): ContentLine | null {
  let inQuotes = false;
  let colonIndex = -1;
  const semicolons: number[] = [];

  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && char === ";") {
      semicolons.push(i);
    } else if (!inQuotes && char === ":") {
      colonIndex = i;
      break;
    }
  }

  if (colonIndex < 0) {
    return null;
  }

  const bounds = [...semicolons, colonIndex];
  const name = line.slice(0, bounds[0]).trim().toUpperCase();
  if (!name) {
    return null;
  }

  const params: Record<string, string> = {};
  for (let i = 0; i < bounds.length - 1; i += 1) {
    const rawParam = line.slice(bounds[i] + 1, bounds[i + 1]);
    const eqIndex = rawParam.indexOf("=");
    if (eqIndex < 0) {
      continue;
    }
    const key = rawParam.slice(0, eqIndex).trim().toUpperCase();
    params[key] = rawParam.slice(eqIndex + 1).trim().replace(/^"|"$/g, "");
  }

  return { name, params, value: line.slice(colonIndex + 1) };
}

function formatParamValue(value: string): string {
  return /[:;,]/.test(value) ? `"${value}"` : value;
}

export function formatContentLine(line: ContentLine): string {
  const params = Object.entries(line.params)
    .map(([key, value]) => `;${key}=${formatParamValue(value)}`)
    .join("");
  return `${line.name}${params}:${line.value}`;
}

export function unescapeText(input: string): string {
  return input.replace(/\\([nN,;\\])/g, (_match, escaped: string) =>
    escaped === "n" || escaped === "N" ? "\n" : escaped,
  );
}
