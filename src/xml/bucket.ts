/**
 * XML for bucket configuration requests
 * @module s3-resumable-client/xml/bucket
 */

import { buildXml, getNode, getText, parseXml } from './parser.js';

/**
 * Builds the CreateBucketConfiguration body carrying a LocationConstraint
 */
export function buildCreateBucketXml(region: string): string {
  return buildXml({
    CreateBucketConfiguration: {
      '@_xmlns': 'http://s3.amazonaws.com/doc/2006-03-01/',
      LocationConstraint: region,
    },
  });
}

/**
 * Reads the LocationConstraint of a CreateBucketConfiguration body
 */
export function parseCreateBucketXml(xml: string): string | undefined {
  const config = getNode(parseXml(xml), 'CreateBucketConfiguration');
  return getText(config, 'LocationConstraint') || undefined;
}
