/**
 * Order Status Constants
 * Orders are created as pending; no transition is implemented yet.
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const DEFAULT_ORDER_STATUS: OrderStatus = ORDER_STATUS.PENDING;

/**
 * Round a monetary amount to cents, using the exact binary value of the amount.
 * Exact half-cent ties go to the even cent.
 */
export const roundMoney = (amount: number): number => {
  // toFixed rounds the exact value, sending ties away from zero
  const rounded = Number(amount.toFixed(2));
  const [, fraction = ''] = Math.abs(amount).toFixed(100).split('.');
  const isTie = fraction[2] === '5' && /^0*$/.test(fraction.slice(3));
  if (!isTie) {
    return rounded;
  }

  const cents = Math.round(Math.abs(rounded) * 100);
  return cents % 2 === 0 ? rounded : (Math.sign(amount) * (cents - 1)) / 100;
};
