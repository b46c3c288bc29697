import {
  Controller,
  Get,
  Post,
  Param,
  Body,
  HttpCode,
  HttpStatus,
  NotFoundException,
  BadRequestException,
  ConflictException,
  ServiceUnavailableException,
  Inject,
  Logger,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  Checkout,
  CheckoutAction,
  CheckoutService,
  CheckoutState,
  GatewayError,
} from '../../../core';
import {
  ApiCreateCheckoutFromParams,
  ApiCreateCheckoutFromToken,
  ApiGetCheckout,
  ApiGetCheckoutActions,
  ApiLinkTransaction,
} from '../../../_shared/swagger/decorators';
import {
  CreateCheckoutFromParamsDto,
  CreateCheckoutFromTokenDto,
  LinkTransactionDto,
} from '../../../_shared/dto';

type CheckoutView = ReturnType<Checkout['toPlainObject']>;

/**
 * Checkout Controller
 */
@ApiTags('Checkouts')
@Controller('checkouts')
export class CheckoutController {
  private readonly logger = new Logger(CheckoutController.name);

  constructor(
    @Inject(CheckoutService)
    private readonly checkoutService: CheckoutService,
  ) {}

  @Post('from-params')
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateCheckoutFromParams()
  async createFromParams(
    @Body() dto: CreateCheckoutFromParamsDto,
  ): Promise<CheckoutView> {
    const checkout = await this.checkoutService.createFromParams(dto);
    this.logger.log(`Checkout created: ${checkout.id}`);
    return checkout.toPlainObject();
  }

  @Post('from-token')
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateCheckoutFromToken()
  async createFromToken(
    @Body() dto: CreateCheckoutFromTokenDto,
  ): Promise<CheckoutView> {
    try {
      const checkout = await this.checkoutService.createFromToken(
        dto.token,
        dto.paymentMethodId,
      );
      this.logger.log(
        `Checkout created from vaulted method on ${dto.paymentMethodId}: ${checkout.id}`,
      );
      return checkout.toPlainObject();
    } catch (error) {
      if (error instanceof GatewayError) {
        if (error.code === 'UNKNOWN_PAYMENT_METHOD') {
          throw new BadRequestException(error.message);
        }
        if (error.isTransient) {
          throw new ServiceUnavailableException(error.message);
        }
      }
      throw error;
    }
  }

  @Get(':id')
  @ApiGetCheckout()
  async getCheckout(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<CheckoutView> {
    const checkout = await this.findOrFail(id);
    return checkout.toPlainObject();
  }

  @Get(':id/actions')
  @ApiGetCheckoutActions()
  async getActions(@Param('id', ParseUUIDPipe) id: string): Promise<{
    checkoutId: string;
    state: CheckoutState;
    actions: CheckoutAction[];
  }> {
    const checkout = await this.findOrFail(id);
    return {
      checkoutId: checkout.id,
      state: checkout.state,
      actions: this.checkoutService.actionsFor(checkout),
    };
  }

  @Post(':id/transaction')
  @HttpCode(HttpStatus.OK)
  @ApiLinkTransaction()
  async linkTransaction(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: LinkTransactionDto,
  ): Promise<CheckoutView> {
    const checkout = await this.findOrFail(id);
    if (checkout.transactionId) {
      throw new ConflictException(
        `Checkout ${id} is already linked to transaction ${checkout.transactionId}`,
      );
    }

    const linked = await this.checkoutService.linkTransaction(
      id,
      dto.transactionId,
    );
    return linked.toPlainObject();
  }

  private async findOrFail(id: string): Promise<Checkout> {
    const checkout = await this.checkoutService.getCheckout(id);
    if (!checkout) {
      throw new NotFoundException(`Checkout not found: ${id}`);
    }
    return checkout;
  }
}
