export { CheckoutEntity } from './checkout.entity';
export { PaymentEntity } from './payment.entity';
export { OrderEntity } from './order.entity';
