import { IsEmail, IsOptional, IsString, MaxLength } from 'class-validator';

export class OrderLookupQueryDto {
  // Shape is checked by the lookup; any non-matching value gets the not-found answer.
  @IsString()
  order_id!: string;

  @IsOptional()
  @IsEmail()
  @MaxLength(254)
  customer_email?: string;
}
