import { describe, expect, it } from 'vitest';
import { Detent, detentHeight, isPresentationDetent, isRenderableDetent } from './presentationDetent';

describe('Detent constructors', () => {
    it('builds comparable string detents', () => {
        expect(Detent.height(300)).toBe('height:300');
        expect(Detent.fraction(0.25)).toBe('fraction:0.25');
        expect(Detent.height(300) === Detent.height(300)).toBe(true);
        expect(new Set([Detent.medium, Detent.medium, Detent.large]).size).toBe(2);
    });

    it('gives non-finite sizes that are neither valid nor renderable', () => {
        expect(Detent.height(Number.NaN)).toBe('height:NaN');
        expect(isPresentationDetent(Detent.height(Number.NaN))).toBe(false);
        expect(isPresentationDetent(Detent.fraction(Number.POSITIVE_INFINITY))).toBe(false);
        expect(isRenderableDetent(Detent.fraction(Number.POSITIVE_INFINITY))).toBe(false);
    });
});

describe('isPresentationDetent', () => {
    it('accepts every detent form', () => {
        expect(isPresentationDetent('large')).toBe(true);
        expect(isPresentationDetent('medium')).toBe(true);
        expect(isPresentationDetent('height:120.5')).toBe(true);
        expect(isPresentationDetent('fraction:0.4')).toBe(true);
    });

    it('rejects other values', () => {
        expect(isPresentationDetent('small')).toBe(false);
        expect(isPresentationDetent('height:')).toBe(false);
        expect(isPresentationDetent('height:NaN')).toBe(false);
        expect(isPresentationDetent(300)).toBe(false);
        expect(isPresentationDetent(null)).toBe(false);
    });
});

describe('isRenderableDetent', () => {
    it('requires positive heights', () => {
        expect(isRenderableDetent('height:1')).toBe(true);
        expect(isRenderableDetent('height:0')).toBe(false);
        expect(isRenderableDetent('height:-5')).toBe(false);
        expect(isRenderableDetent(Detent.height(Number.NaN))).toBe(false);
    });

    it('requires fractions in (0, 1]', () => {
        expect(isRenderableDetent('fraction:1')).toBe(true);
        expect(isRenderableDetent('fraction:0.5')).toBe(true);
        expect(isRenderableDetent('fraction:0')).toBe(false);
        expect(isRenderableDetent('fraction:1.5')).toBe(false);
    });

    it('always renders the system detents', () => {
        expect(isRenderableDetent('large')).toBe(true);
        expect(isRenderableDetent('medium')).toBe(true);
    });
});

describe('detentHeight', () => {
    it('maps detents to css heights', () => {
        expect(detentHeight('large')).toBe('min(88dvh, calc(100dvh - env(safe-area-inset-top, 0px)))');
        expect(detentHeight('medium')).toBe('50dvh');
        expect(detentHeight('height:300')).toBe('300px');
        expect(detentHeight('fraction:0.25')).toBe('25dvh');
    });

    it('rounds fractions to two decimals of dvh', () => {
        expect(detentHeight('fraction:0.3')).toBe('30dvh');
        expect(detentHeight('fraction:0.33333')).toBe('33.33dvh');
    });
});
