export const PRODUCT_NAME = 'clipcourier';
export const CLI_NAME = 'clipcourier';
export const VERSION = '1.0.0';

export const CONFIG_FILE_NAME = 'clipcourier.config.json';
