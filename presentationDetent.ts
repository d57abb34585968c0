/*
|----------------------------------------------------------------------------
| presentationDetent.ts — discrete sheet sizes
|----------------------------------------------------------------------------
*/

export type PresentationDetent = 'large' | 'medium' | `height:${number}` | `fraction:${number}`;

/** Non-finite sizes give detents that fail `isPresentationDetent`; sheets drop them as unrenderable. */
export const Detent = {
    large: 'large',
    medium: 'medium',
    height: (px: number): PresentationDetent => `height:${px}`,
    fraction: (f: number): PresentationDetent => `fraction:${f}`,
} as const;

const LARGE_HEIGHT = 'min(88dvh, calc(100dvh - env(safe-area-inset-top, 0px)))';
const MEDIUM_HEIGHT = '50dvh';

const PARAMETRIC = /^(height|fraction):(-?\d+(?:\.\d+)?(?:e[+-]?\d+)?)$/;

function parse(detent: string): { kind: 'height' | 'fraction'; value: number } | null {
    const m = PARAMETRIC.exec(detent);
    if (!m) return null;
    return { kind: m[1] === 'height' ? 'height' : 'fraction', value: Number(m[2]) };
}

export function isPresentationDetent(value: unknown): value is PresentationDetent {
    if (typeof value !== 'string') return false;
    return value === 'large' || value === 'medium' || parse(value) !== null;
}

/** Whether a sheet can show the detent: positive heights, fractions in (0, 1]. */
export function isRenderableDetent(detent: PresentationDetent): boolean {
    if (detent === 'large' || detent === 'medium') return true;
    const p = parse(detent);
    if (!p || !Number.isFinite(p.value)) return false;
    return p.kind === 'height' ? p.value > 0 : p.value > 0 && p.value <= 1;
}

/** CSS `height` for a sheet resting at the detent. */
export function detentHeight(detent: PresentationDetent): string {
    if (detent === 'large') return LARGE_HEIGHT;
    if (detent === 'medium') return MEDIUM_HEIGHT;
    const p = parse(detent);
    if (!p) return LARGE_HEIGHT;
    if (p.kind === 'height') return `${p.value}px`;
    return `${Math.round(p.value * 10000) / 100}dvh`;
}
