/**
 * Binary tip notification pushed over the headers websocket:
 *
 *   [ 0 .. 80)  raw block header, as served by HeaderSV
 *   [80 .. 84)  chain height, uint32 little-endian
 */
export const HEADER_SIZE = 80;
export const TIP_FRAME_SIZE = HEADER_SIZE + 4;

const MAX_UINT32 = 0xffffffff;

export class TipEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TipEncodingError";
  }
}

export function encodeTip(rawHeader: Uint8Array, height: number): Buffer {
  if (rawHeader.length !== HEADER_SIZE) {
    throw new TipEncodingError(
      `Raw header must be ${HEADER_SIZE} bytes, got ${rawHeader.length}`
    );
  }
  if (!Number.isInteger(height) || height < 0 || height > MAX_UINT32) {
    throw new TipEncodingError(`Height ${height} is not a uint32`);
  }

  const frame = Buffer.alloc(TIP_FRAME_SIZE);
  frame.set(rawHeader, 0);
  frame.writeUInt32LE(height, HEADER_SIZE);
  return frame;
}

export function decodeTip(frame: Uint8Array): { rawHeader: Buffer; height: number } {
  if (frame.length !== TIP_FRAME_SIZE) {
    throw new TipEncodingError(
      `Tip frame must be ${TIP_FRAME_SIZE} bytes, got ${frame.length}`
    );
  }
  const buf = Buffer.from(frame);
  return {
    rawHeader: buf.subarray(0, HEADER_SIZE),
    height: buf.readUInt32LE(HEADER_SIZE),
  };
}
