export * from './presentationDetent';
export * from './useChangeCompat';
export * from './useBottomSheet';
export * from './useDismissInterceptor';
export * from './sheetInterceptorPlugin';
export { setLogVerbose, isLogVerbose } from './log';
