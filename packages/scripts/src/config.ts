/**
 * Base URLs of the two published renderings of the standard
 */

import type { ResolverConfig } from './types.js'

export const DEFAULT_BASE_LONG_URL = 'http://dicom.nema.org/medical/dicom/current/output/html/'
export const DEFAULT_BASE_SHORT_URL = 'http://dicom.nema.org/medical/dicom/current/output/chtml/'

export const config: ResolverConfig = {
  baseLongUrl: process.env.DICOM_BASE_LONG_URL || DEFAULT_BASE_LONG_URL,
  baseShortUrl: process.env.DICOM_BASE_SHORT_URL || DEFAULT_BASE_SHORT_URL
}
