export * from './resource.js';
export * from './schemas.js';
export * from './uri.js';
export * from './project.js';
export * from './model.js';
export * from './forecast.js';
export * from './unit.js';
export * from './target.js';
export * from './timezero.js';
export * from './upload-file-job.js';
