// Backslash escapes shared by host string literals and interpolated
// literal fragments. Unknown escapes keep their backslash.
export function resolveEscape(escaped: string): string {
  switch (escaped) {
    case "n": return "\n";
    case "t": return "\t";
    case "r": return "\r";
    case "0": return "\0";
    case "\\": return "\\";
    case '"': return '"';
    case "'": return "'";
    default:
      return "\\" + escaped;
  }
}

/** Quote `value` as a host string literal. */
export function quoteString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case "\\": out += "\\\\"; break;
      case '"': out += '\\"'; break;
      case "\n": out += "\\n"; break;
      case "\t": out += "\\t"; break;
      case "\r": out += "\\r"; break;
      case "\0": out += "\\0"; break;
      default: out += ch;
    }
  }
  return out + '"';
}
