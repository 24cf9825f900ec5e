export { createRequestContext } from './context';
export {
  MwsQuery,
  buildQuery,
  requestUri,
  toSignedRequest,
  FORM_CONTENT_TYPE,
} from './query';
