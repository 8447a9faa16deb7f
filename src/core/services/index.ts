export * from './payment.service';
