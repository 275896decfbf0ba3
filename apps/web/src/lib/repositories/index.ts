export { BaseRepository } from './base.repository';
export type { PaginationOptions, PaginatedResult, OrderingOption } from './base.repository';

export { PayPalConfigRepository, CONFIG_ORDERING_COLUMNS } from './paypal-config.repository';
export type { PayPalConfigFilters, ConfigOrderingColumn } from './paypal-config.repository';

export { WebhookEventRepository } from './webhook-event.repository';
export type { WebhookEventFilters } from './webhook-event.repository';

export { WebhookEndpointRepository } from './webhook-endpoint.repository';

export { PaymentRepository } from './payment.repository';
