export { ConfluenceClient, fromEnv, parsePageUrl, buildAuthHeader, pageFromApi } from "./api.js";
export type { ApiPage, AuthOptions, ConfluenceClientOptions, PageFetcher, PageUrlInfo } from "./api.js";
export { AttachmentService, selectAttachment } from "./attachments.js";
export type { AttachmentDownloader, AttachmentResolver } from "./attachments.js";
export { Converter, DEFAULT_IMAGE_FOLDER, postprocessMarkdown } from "./converter.js";
export type { ConverterOptions } from "./converter.js";
export {
  AttachmentNotFoundError,
  AttachmentResolutionError,
  ConfluenceApiError,
  PageValidationError,
} from "./errors.js";
export { ImageDownloader, DEFAULT_MAX_IMAGE_SIZE } from "./images.js";
export type { ImageDownloaderOptions } from "./images.js";
export { MacroDispatcher, classifyElement } from "./macros.js";
export type { AdmonitionVariant, ConfluenceElement, MacroResult } from "./macros.js";
export { MarkdownDocument, frontmatterFromPage } from "./markdown-document.js";
export type { ConfluenceRef, Frontmatter, ImageRef } from "./markdown-document.js";
export { defaultFileName, generateFileName, saveMarkdownDocument, slugify, templateNamer } from "./output.js";
export type { FileNamer } from "./output.js";
export { pageUrl, validateAttachment, validatePage } from "./page.js";
export type { Attachment, Page, PageUser } from "./page.js";
export { TableFlattener } from "./table-flatten.js";
export { VERSION } from "./version.js";
