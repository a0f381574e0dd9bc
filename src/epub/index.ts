export { processEpub, DEFAULT_SKIP_PAGES } from "./processor";
export type { ProcessOptions, ProcessResult } from "./processor";
export { EpubValidationError, validateInput, validateOutputPath } from "./validate";
export { smartShortenTitle, DEFAULT_MAX_TITLE_LENGTH } from "./titles";
export { shortenNcxTitles, shortenNavTitles } from "./toc";
export { stripImages, stripImageMarkup } from "./images";
export { createDiagnostics } from "./diagnostics";
export type { BuildInfo, Diagnostics } from "./diagnostics";
