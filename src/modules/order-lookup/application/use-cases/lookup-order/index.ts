export { LookupOrderUseCase, type LookupOrderInput } from './lookup-order.use-case';
export { extractShipmentTracking, type ShipmentTracking } from './order-facts';
