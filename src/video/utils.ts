import { PNG } from 'pngjs';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export function readFrameAsGrayscale(pngBuffer: Buffer): GrayscaleFrame {
  const image = PNG.sync.read(pngBuffer);
  const { width, height, data } = image;
  const grayscale = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(0.2126 * r + 0.7152 * g + 0.0722 * b);
  }

  return { width, height, data: grayscale };
}

export function averageLuminance(frame: GrayscaleFrame): number {
  const { data } = frame;
  if (data.length === 0) {
    return 0;
  }

  let total = 0;
  for (let i = 0; i < data.length; i += 1) {
    total += data[i];
  }

  return total / data.length;
}

/**
 * Variance of the 4-neighbour Laplacian response over interior pixels.
 * Frames narrower or shorter than three pixels have no interior and score 0.
 */
export function laplacianVariance(frame: GrayscaleFrame): number {
  const { width, height, data } = frame;
  if (width < 3 || height < 3) {
    return 0;
  }

  let sum = 0;
  let sumSquares = 0;
  let count = 0;

  for (let y = 1; y < height - 1; y += 1) {
    for (let x = 1; x < width - 1; x += 1) {
      const index = y * width + x;
      const response =
        data[index - width] + data[index + width] + data[index - 1] + data[index + 1] - 4 * data[index];
      sum += response;
      sumSquares += response * response;
      count += 1;
    }
  }

  const mean = sum / count;
  return sumSquares / count - mean * mean;
}

/** Box-filter downsample; cells that cover no source pixel reuse the nearest one. */
export function resizeArea(frame: GrayscaleFrame, width: number, height: number): GrayscaleFrame {
  const output = new Uint8Array(width * height);

  for (let ty = 0; ty < height; ty += 1) {
    const y0 = clamp(Math.floor((ty * frame.height) / height), 0, frame.height - 1);
    const y1 = clamp(Math.floor(((ty + 1) * frame.height) / height), y0 + 1, frame.height);
    for (let tx = 0; tx < width; tx += 1) {
      const x0 = clamp(Math.floor((tx * frame.width) / width), 0, frame.width - 1);
      const x1 = clamp(Math.floor(((tx + 1) * frame.width) / width), x0 + 1, frame.width);

      let total = 0;
      for (let y = y0; y < y1; y += 1) {
        for (let x = x0; x < x1; x += 1) {
          total += frame.data[y * frame.width + x];
        }
      }
      output[ty * width + tx] = Math.round(total / ((y1 - y0) * (x1 - x0)));
    }
  }

  return { width, height, data: output };
}

export function clamp(value: number, min: number, max: number) {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
