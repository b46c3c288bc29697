/**
 * DTOs for the checkout sync API
 */

export * from './checkout.dto';
