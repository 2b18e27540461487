export * from './aggregates/booking.aggregate';
export * from './value-objects/index';
export * from './events/booking-status-changed.event';
export * from './errors/index';
export * from './policies/status-transition.policy';
export * from './policies/clash.policy';
export * from './policies/editable-fields.policy';
export * from './policies/archival.policy';
export * from './repositories/booking-store.interface';
export * from './gateways/notification-gateway.interface';
export * from './gateways/raw-row-source.interface';
export * from './gateways/clock.interface';
