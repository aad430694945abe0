import fs from 'fs';

const MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]); // \x93NUMPY
const HEADER_ALIGN = 64;

/**
 * Header of a version 1.0 .npy file holding a C-ordered uint8 array.
 * The total preamble (magic, version, length, dict) is padded with spaces
 * and ends in a newline at a multiple of 64 bytes.
 */
export function npyHeader(shape: readonly number[]): Buffer {
  const shapeText = shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(', ')})`;
  const dict = `{'descr': '|u1', 'fortran_order': False, 'shape': ${shapeText}, }`;
  const preamble = MAGIC.length + 2 + 2;
  const unpadded = preamble + dict.length + 1;
  const padding = (HEADER_ALIGN - (unpadded % HEADER_ALIGN)) % HEADER_ALIGN;
  const headerText = dict + ' '.repeat(padding) + '\n';

  const out = Buffer.alloc(preamble + headerText.length);
  MAGIC.copy(out, 0);
  out[6] = 1;
  out[7] = 0;
  out.writeUInt16LE(headerText.length, 8);
  out.write(headerText, preamble, 'latin1');
  return out;
}

/**
 * Stack equally sized rows into one uint8 array of shape `[rows.length, ...rowShape]`
 * and write it to `file`.
 */
export function saveStackedUint8(file: string, rows: readonly Uint8Array[], rowShape: readonly number[]): void {
  const rowSize = rowShape.reduce((a, b) => a * b, 1);
  rows.forEach((row, i) => {
    if (row.length !== rowSize) {
      throw new Error(`row ${i} has ${row.length} bytes, expected ${rowSize} for shape [${rowShape.join(', ')}]`);
    }
  });
  const fd = fs.openSync(file, 'w');
  try {
    fs.writeSync(fd, npyHeader([rows.length, ...rowShape]));
    for (const row of rows) {
      fs.writeSync(fd, row);
    }
  } finally {
    fs.closeSync(fd);
  }
}
