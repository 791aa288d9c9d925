import table from './cp437.json' with { type: 'json' };

// Code points for bytes 0x80-0xff; the lower half is ASCII.
const UPPER: readonly string[] = [...table.upper.join('')];

export function decodeCp437(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    out += byte < 0x80 ? String.fromCharCode(byte) : (UPPER[byte - 0x80] ?? '�');
  }
  return out;
}
