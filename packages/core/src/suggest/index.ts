/**
 * Pattern suggestion utilities.
 * @packageDocumentation
 */

export { suggestPattern, URL_PATTERN, EMAIL_PATTERN, PHONE_PATTERN, ZIP_PATTERN } from './suggest'
