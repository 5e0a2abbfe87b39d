export * from './helpers';
export * from './errors';
export * from './filenames';
export * from './archive-paths';
export * from './status-message';
export { t } from './i18n';
