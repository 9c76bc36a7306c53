/**
 * Splits an extra-arguments string ("--cpus 2 --label 'a b'") the way a
 * shell would for plain words and single or double quotes.
 * Throws on an unterminated quote.
 */
export function parseArgsString(str: string): string[] {
  const args: string[] = [];
  let current = "";
  let pending = false;
  let inQuote: "'" | '"' | null = null;

  for (const char of str) {
    if (inQuote) {
      if (char === inQuote) {
        inQuote = null;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      inQuote = char;
      pending = true;
    } else if (/\s/.test(char)) {
      if (pending) {
        args.push(current);
        current = "";
        pending = false;
      }
    } else {
      current += char;
      pending = true;
    }
  }
  if (inQuote) {
    throw new Error(`Unterminated ${inQuote} in arguments: ${str}`);
  }
  if (pending) args.push(current);
  return args;
}

// Display form of an argument list; quotes anything parseArgsString would split
export function formatArgs(args: string[]): string {
  return args
    .map((arg) => (arg === "" || /[\s'"]/.test(arg) ? `'${arg.replace(/'/g, `'"'"'`)}'` : arg))
    .join(" ");
}
