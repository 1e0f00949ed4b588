export * from './common/contact-details';
export * from './common/errors';
export * from './common/json';
export * from './common/result';
export * from './config';
export * from './extraction/doc-parser';
export * from './extraction/docx-parser';
export * from './extraction/mime-type';
export * from './extraction/pdf-parser';
export * from './extraction/text-extractor';
export * from './integrations/dynamodb';
export * from './integrations/openai';
export * from './models/completion';
export * from './models/evaluation';
export * from './models/interview-qa';
export * from './models/resume-document';
export * from './models/usage-log';
export * from './models/user';
export * from './services/evaluation.service';
export * from './services/interview-qa.service';
export * from './services/ranking';
export * from './services/screening-session';
export * from './services/usage-analytics.service';
export * from './services/usage-report';
