export { BUNDLE_FILES, loadBundle, saveBundle } from './bundle-codec';
export type { LoadBundleOptions, SaveBundleOptions } from './bundle-codec';
export { decodeConfig, encodeConfig } from './config-format';
export { decodeIndex, encodeIndex, INDEX_FORMAT_VERSION, readIndexHeader } from './index-format';
export type { IndexHeader } from './index-format';
export { decodeMetadata, encodeMetadata, METADATA_FORMAT, METADATA_FORMAT_VERSION } from './metadata-format';
