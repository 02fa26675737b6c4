import {
  type INetworkThreshold,
  type ITransactionRecord,
  ThresholdUnit,
  UnpricedUsdPolicy,
} from '../../core/transactions/transaction.interfaces';

export const normalizeAddress = (address: string): string => address.trim().toLowerCase();

export const buildSystemAddressSet = (addresses: readonly string[]): ReadonlySet<string> => {
  return new Set<string>(addresses.map(normalizeAddress));
};

export const isSystemTransfer = (
  transaction: ITransactionRecord,
  systemAddresses: ReadonlySet<string>,
): boolean => {
  if (systemAddresses.size === 0) {
    return false;
  }

  return (
    systemAddresses.has(normalizeAddress(transaction.sender)) ||
    systemAddresses.has(normalizeAddress(transaction.receiver))
  );
};

export const hasVerifiedUsdAmount = (transaction: ITransactionRecord): boolean => {
  return transaction.amountUsd !== null && transaction.priceVerified;
};

// Inclusive: an amount equal to the threshold passes.
export const passesThreshold = (
  transaction: ITransactionRecord,
  threshold: INetworkThreshold,
  unpricedPolicy: UnpricedUsdPolicy,
): boolean => {
  if (threshold.unit === ThresholdUnit.NATIVE) {
    return transaction.amountNative >= threshold.value;
  }

  if (transaction.amountUsd === null || !transaction.priceVerified) {
    return unpricedPolicy === UnpricedUsdPolicy.PASS;
  }

  return transaction.amountUsd >= threshold.value;
};
