export { openInput, runManifestPlugin, type RunManifestPluginOptions, STDIN_SOURCE } from './core'
export { createManifestGenerator, MANIFEST_SUFFIX, manifestFileName } from './core/manifest/generator'
export { renderManifest, toFileManifest, type FileManifest } from './core/manifest/render'
