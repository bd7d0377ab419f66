/**
 * products://list resource
 *
 * Every live product as a pretty-printed JSON array.
 */

import { SerializationError, errorMessage } from '@mcp-demo/shared';
import type { Product } from '@mcp-demo/shared';
import type { ProductReader } from '../storage.js';
import type { ResourceDefinition } from '../tool-registry.js';

export const PRODUCTS_URI = 'products://list';
export const PRODUCTS_MIME_TYPE = 'application/json';

export function serializeProducts(products: Product[]): string {
  try {
    return JSON.stringify(products, null, 2);
  } catch (error) {
    throw new SerializationError(`failed to marshal products to JSON: ${errorMessage(error)}`, { cause: error });
  }
}

export function createProductsResource(store: ProductReader): ResourceDefinition {
  return {
    uri: PRODUCTS_URI,
    name: 'Product List',
    description: 'Lists all available products',
    mimeType: PRODUCTS_MIME_TYPE,
    handler: async (_uri, context) => [
      {
        uri: PRODUCTS_URI,
        mimeType: PRODUCTS_MIME_TYPE,
        text: serializeProducts(store.listAll(context.signal)),
      },
    ],
  };
}
