/**
 * Builds the order-details URL for a vendor order.
 *
 * @example
 * buildOrderLink('702-8237239-1234567', 'amazon.ca')
 * // 'https://www.amazon.ca/gp/your-account/order-details?ie=UTF8&orderID=702-8237239-1234567'
 */
export function buildOrderLink(orderId: string, vendorDomain: string): string {
  const domain = vendorDomain.replace(/^https?:\/\//i, '').replace(/^www\./i, '').replace(/\/+$/, '');
  return `https://www.${domain}/gp/your-account/order-details?ie=UTF8&orderID=${encodeURIComponent(orderId)}`;
}

export default buildOrderLink;
