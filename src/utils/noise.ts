import type { Prng } from './prng';

export interface NoiseOptions {
    octaves: number;
    persistence: number;
}

export const DEFAULT_NOISE: NoiseOptions = {
    octaves: 6,
    persistence: 0.5,
};

/**
 * Fractal smoothed noise normalised to [0, 1], row-major (`y * size + x`).
 * Each octave is a white-noise layer blurred by repeated 3x3 box passes;
 * low octaves get more passes and a larger amplitude.
 */
export function fractalNoise(size: number, rng: Prng, options: NoiseOptions = DEFAULT_NOISE): Float64Array {
    const noise = new Float64Array(size * size);
    let amplitude = 1.0;

    for (let octave = 0; octave < options.octaves; octave++) {
        const layer = new Float64Array(size * size);
        for (let i = 0; i < layer.length; i++) layer[i] = rng.next();

        let smoothed: Float64Array = layer;
        const passes = Math.max(1, options.octaves - octave);
        for (let p = 0; p < passes; p++) smoothed = boxBlur(smoothed, size);

        for (let i = 0; i < noise.length; i++) noise[i] += amplitude * smoothed[i];
        amplitude *= options.persistence;
    }

    return normalise(noise);
}

// Average of the 3x3 neighbourhood (clipped at the border) blended 50/50 with the centre
function boxBlur(src: Float64Array, size: number): Float64Array {
    const out = new Float64Array(src.length);
    for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
            let sum = 0;
            let count = 0;
            for (let dy = -1; dy <= 1; dy++) {
                const ny = y + dy;
                if (ny < 0 || ny >= size) continue;
                for (let dx = -1; dx <= 1; dx++) {
                    const nx = x + dx;
                    if (nx < 0 || nx >= size) continue;
                    sum += src[ny * size + nx];
                    count++;
                }
            }
            out[y * size + x] = (sum / count + src[y * size + x]) / 2;
        }
    }
    return out;
}

function normalise(values: Float64Array): Float64Array {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
        if (v < min) min = v;
        if (v > max) max = v;
    }
    const range = max - min;
    if (range === 0) return values.fill(0);
    for (let i = 0; i < values.length; i++) values[i] = (values[i] - min) / range;
    return values;
}
