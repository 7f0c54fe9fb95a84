export const SITE_ORIGIN = 'https://www.wildberries.ru';
export const CATALOGUE_URL = 'https://static-basket-01.wb.ru/vol0/data/main-menu-ru-ru-v2.json';
export const CATALOG_API_ORIGIN = 'https://catalog.wb.ru';
export const SEARCH_API_ORIGIN = 'https://search.wb.ru';
export const ORDER_QUANTITY_URL = 'https://product-order-qnt.wildberries.ru/by-nm/';
export const CATALOGUE_CACHE_FILE = 'wb_catalogue.json';
