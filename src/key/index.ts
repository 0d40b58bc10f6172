export { Label, intoLabels, type IntoLabels } from './label.js';
export { Key, intoKey, type IntoKey } from './key.js';
