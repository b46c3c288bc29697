import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * DTO for creating a checkout from card-tokenization parameters
 */
export class CreateCheckoutFromParamsDto {
  @ApiPropertyOptional({
    description: 'PayPal account email, for PayPal checkouts',
    example: 'buyer@example.com',
  })
  @IsOptional()
  @IsEmail()
  paypalEmail?: string;

  @ApiPropertyOptional({
    description: 'Card brand label as reported by the gateway',
    example: 'MasterCard',
  })
  @IsOptional()
  @IsString()
  @Length(1, 64)
  cardType?: string;

  @ApiPropertyOptional({
    description: 'Last digits of the card number',
    example: '42',
  })
  @IsOptional()
  @Matches(/^\d{1,4}$/, { message: 'lastTwo must contain 1 to 4 digits' })
  lastTwo?: string;
}

/**
 * DTO for creating a checkout from a vaulted payment method
 */
export class CreateCheckoutFromTokenDto {
  @ApiProperty({
    description: 'Vaulted payment method token',
    example: 'pm_token_123',
  })
  @IsNotEmpty()
  @IsString()
  token!: string;

  @ApiProperty({
    description: 'Payment method the token belongs to',
    example: 'braintree',
  })
  @IsNotEmpty()
  @IsString()
  paymentMethodId!: string;
}

/**
 * DTO for linking the gateway transaction to a checkout
 */
export class LinkTransactionDto {
  @ApiProperty({
    description: 'Gateway transaction id',
    example: 'dHJhbnNhY3Rpb25fYWJjMTIz',
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 255)
  transactionId!: string;
}
