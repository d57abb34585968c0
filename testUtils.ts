/*
|----------------------------------------------------------------------------
| testUtils.ts — mounting helpers shared by the *.test.ts files
|----------------------------------------------------------------------------
*/

import { createApp, defineComponent, effectScope, h, type App, type Component, type EffectScope, type Plugin } from 'vue';
import { useBottomSheet, type BottomSheet, type BottomSheetOptions } from './useBottomSheet';

/** Lets watchers, the render flush and anything queued with nextTick run. */
export function settle(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 0));
}

export function runInScope<T>(fn: () => T): { value: T; scope: EffectScope } {
    const scope = effectScope();
    const value = scope.run(fn);
    if (value === undefined) throw new Error('effect scope is not active');
    return { value, scope };
}

export interface Mounted {
    app: App;
    el: HTMLElement;
    unmount: () => void;
}

function mountRoot(root: Component, plugins: Plugin[]): Mounted {
    const el = document.createElement('div');
    document.body.appendChild(el);
    const app = createApp(root);
    plugins.forEach((p) => app.use(p));
    app.mount(el);
    return {
        app,
        el,
        unmount: () => {
            app.unmount();
            el.remove();
        },
    };
}

/** Mounts a component whose setup runs `setup`. */
export function mountSetup(setup: () => void, plugins: Plugin[] = []): Mounted {
    const Root = defineComponent({
        setup() {
            setup();
            return () => h('div');
        },
    });
    return mountRoot(Root, plugins);
}

export interface MountSheetOptions {
    sheet?: BottomSheetOptions;
    plugins?: Plugin[];
    /** Open the sheet during setup. Default true. */
    open?: boolean;
}

/** Mounts a bottom sheet presenting `content` while open. */
export function mountSheet(content: Component | null, opts: MountSheetOptions = {}): Mounted & { sheet: BottomSheet } {
    const captured: { sheet?: BottomSheet } = {};
    const Host = defineComponent({
        setup() {
            const sheet = useBottomSheet(opts.sheet);
            if (opts.open ?? true) sheet.open();
            captured.sheet = sheet;
            return () =>
                h('div', { class: 'host' }, sheet.isOpen.value ? [h('div', sheet.bindOverlay()), h('div', sheet.bindSheet(), content ? [h(content)] : [])] : []);
        },
    });
    const mounted = mountRoot(Host, opts.plugins ?? []);
    const sheet = captured.sheet;
    if (!sheet) throw new Error('sheet host did not run setup');
    return { ...mounted, sheet };
}

export function sheetElement(el: HTMLElement): HTMLElement | null {
    return el.querySelector<HTMLElement>('.bs-sheet');
}
