export const PRODUCT_NAME = 'symbolgate';
export const PRODUCT_VERSION = '0.1.0';
