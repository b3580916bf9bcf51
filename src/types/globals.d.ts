/** Package version, injected at build time by tsup and at test time by Vitest. */
declare const __PACKAGE_VERSION__: string;
