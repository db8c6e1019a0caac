export {
  type ArchiveArticleOptions,
  type ArchiveResult,
  nextArticleNumber,
  articleDirectoryName,
  archiveArticle,
  recordPublish,
} from './writer.js';
