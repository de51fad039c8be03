export { errorHandler, HttpError } from './errorHandler';
