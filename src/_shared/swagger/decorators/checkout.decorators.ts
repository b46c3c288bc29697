import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody } from '@nestjs/swagger';
import {
  CreateCheckoutFromParamsDto,
  CreateCheckoutFromTokenDto,
  LinkTransactionDto,
} from '../../dto';

const checkoutSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', format: 'uuid' },
    state: { type: 'string', example: 'authorizing' },
    transactionId: { type: 'string', nullable: true },
    paypalEmail: { type: 'string', nullable: true },
    cardType: { type: 'string', example: 'master' },
    lastDigits: { type: 'string', nullable: true, example: '42' },
    final: { type: 'boolean', example: false },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time' },
  },
};

const checkoutIdParam = ApiParam({
  name: 'id',
  description: 'Checkout ID',
  type: 'string',
  format: 'uuid',
});

export const ApiCreateCheckoutFromParams = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create a checkout from card parameters',
      description:
        'Card type labels are normalized (e.g. MasterCard becomes master). New checkouts start as authorizing.',
    }),
    ApiBody({ type: CreateCheckoutFromParamsDto }),
    ApiResponse({ status: 201, description: 'Checkout created', schema: checkoutSchema }),
    ApiResponse({ status: 400, description: 'Invalid parameters' }),
  );
};

export const ApiCreateCheckoutFromToken = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create a checkout from a vaulted payment method',
      description:
        'Looks the token up on the gateway serving the payment method. An unknown token still creates a checkout, without card details.',
    }),
    ApiBody({ type: CreateCheckoutFromTokenDto }),
    ApiResponse({ status: 201, description: 'Checkout created', schema: checkoutSchema }),
    ApiResponse({ status: 400, description: 'Unknown payment method' }),
    ApiResponse({ status: 503, description: 'Gateway unavailable' }),
  );
};

export const ApiGetCheckout = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Get checkout by ID' }),
    checkoutIdParam,
    ApiResponse({ status: 200, description: 'Checkout found', schema: checkoutSchema }),
    ApiResponse({ status: 404, description: 'Checkout not found' }),
  );
};

export const ApiGetCheckoutActions = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List operator actions eligible for a checkout',
      description: 'void, settle and credit, filtered by the checkout state',
    }),
    checkoutIdParam,
    ApiResponse({
      status: 200,
      description: 'Eligible actions',
      schema: {
        type: 'object',
        properties: {
          checkoutId: { type: 'string', format: 'uuid' },
          state: { type: 'string', example: 'authorized' },
          actions: {
            type: 'array',
            items: { type: 'string', enum: ['void', 'settle', 'credit'] },
          },
        },
      },
    }),
    ApiResponse({ status: 404, description: 'Checkout not found' }),
  );
};

export const ApiLinkTransaction = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Link the gateway transaction to a checkout' }),
    checkoutIdParam,
    ApiBody({ type: LinkTransactionDto }),
    ApiResponse({ status: 200, description: 'Transaction linked', schema: checkoutSchema }),
    ApiResponse({ status: 404, description: 'Checkout not found' }),
    ApiResponse({ status: 409, description: 'A transaction is already linked' }),
  );
};
