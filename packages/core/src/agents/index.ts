export { summarizeAgent, type SummarizeInput } from './summarize.js';
export { summarizeValidatorAgent, type SummarizeValidationInput } from './summarize-validator.js';
export { writeArticleAgent, type WriteArticleInput } from './write-article.js';
export { writeArticleValidatorAgent, type ArticleValidationInput } from './write-article-validator.js';
export { sanitizeDataAgent, type SanitizeInput } from './sanitize-data.js';
export { sanitizeDataValidatorAgent, type SanitizeValidationInput } from './sanitize-data-validator.js';
export { refinerAgent, type RefineInput } from './refiner.js';
export { validatorAgent } from './validator.js';
