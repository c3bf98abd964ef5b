import { PNG } from 'pngjs';
import { InvalidFrameError } from '../errors.js';
import type { Frame } from '../types.js';

export function decodePngFrame(pngBuffer: Buffer, ts = Date.now()): Frame {
  let image: PNG;
  try {
    image = PNG.sync.read(pngBuffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidFrameError(`Undecodable PNG frame: ${reason}`);
  }

  const { width, height, data } = image;
  return { width, height, data: new Uint8Array(data.buffer, data.byteOffset, data.length), ts };
}

export function encodePngFrame(frame: Frame): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  png.data = Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.width * frame.height * 4);
  return PNG.sync.write(png);
}
