const MASK_64 = 0xffffffffffffffffn;
// Reversed ISO 3309 polynomial x^64 + x^4 + x^3 + x + 1.
const ISO_POLY = 0xd800000000000000n;

const buildTable = (poly: bigint): bigint[] => {
  const table: bigint[] = [];
  for (let i = 0; i < 256; i += 1) {
    let crc = BigInt(i);
    for (let bit = 0; bit < 8; bit += 1) {
      crc = (crc & 1n) === 1n ? (crc >> 1n) ^ poly : crc >> 1n;
    }
    table.push(crc);
  }
  return table;
};

const ISO_TABLE = buildTable(ISO_POLY);
const encoder = new TextEncoder();

export const crc64Iso = (value: string): bigint => {
  let crc = MASK_64;
  for (const byte of encoder.encode(value)) {
    crc = ISO_TABLE[Number((crc ^ BigInt(byte)) & 0xffn)] ^ (crc >> 8n);
  }
  return crc ^ MASK_64;
};
