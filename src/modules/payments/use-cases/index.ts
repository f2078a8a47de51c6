export {
  processPayment,
  ProcessPaymentContext,
  DEFAULT_PAYMENT_FAILURE,
} from './process-payment.use-case';
export { refundPayment, RefundPaymentContext } from './refund-payment.use-case';
export { getPayment, GetPaymentContext } from './get-payment.use-case';
