export type {
  CustomerRecord,
  LineItem,
  OrderRecord,
  ShipmentEvent,
  TrackingDetail,
} from './types';
