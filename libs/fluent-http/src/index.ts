export * from './types';
export * from './errors';
export { HttpClient, type ClientSettings } from './HttpClient';
export { HttpRequest, type RequestConfig, type RequestTracer } from './HttpRequest';
export { HttpResponse, type HttpResponseInit } from './HttpResponse';
export { HeaderMap, ParamMap, type MultiValueInit } from './multimap';
export { buildUrl, normalizeBaseUrl, type BuildUrlInput } from './url';
export { encodeBody, FORM_CONTENT_TYPE, NO_BODY, type EncodedBody, type RequestBody } from './body';
export { codecForContentType, createXmlCodec, jsonCodec, xmlCodec, type Codec, type XmlCodecOptions } from './codecs';
export { ResultTarget, resultTarget, type DecodeTarget } from './resultTarget';
export * from './config';
export { Cookie, CookieJar, createCookie, parseSetCookies, type CookieInit } from './cookies';
export { ConsoleLogger, noopLogger, previewBody } from './logger';
export { executeRequest, prepareWireRequest } from './executor';
export { createClient, createClientFromEnv } from './factories';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
