export { CommerceClient } from './commerce-client';
export { CommerceOrderResolver } from './commerce-order-resolver';
export { SearchInlineOrderResolver } from './search-inline.order-resolver';
export { SearchThenDetailOrderResolver } from './search-then-detail.order-resolver';
