import { type NetworkKey, parseNetworkKey } from '../core/networks/network-key.interfaces';
import {
  type INetworkThreshold,
  ThresholdUnit,
} from '../core/transactions/transaction.interfaces';

const THRESHOLD_VALUE_PATTERN: RegExp = /^(\d+(?:\.\d+)?)\s*(usd|native)?$/i;

const splitCsv = (rawValue: string): readonly string[] => {
  return rawValue
    .split(',')
    .map((value: string): string => value.trim())
    .filter((value: string): boolean => value.length > 0);
};

const splitAssignment = (entry: string, variableName: string): readonly [string, string] => {
  const separatorIndex: number = entry.indexOf('=');

  if (separatorIndex <= 0 || separatorIndex === entry.length - 1) {
    throw new Error(`${variableName} entry "${entry}" must look like network=value`);
  }

  return [entry.slice(0, separatorIndex).trim(), entry.slice(separatorIndex + 1).trim()];
};

const resolveNetworkKey = (rawNetwork: string, variableName: string): NetworkKey => {
  const networkKey: NetworkKey | null = parseNetworkKey(rawNetwork);

  if (networkKey === null) {
    throw new Error(`${variableName} references unknown network "${rawNetwork}"`);
  }

  return networkKey;
};

export const parseNetworkList = (rawValue: string): readonly NetworkKey[] => {
  const networkKeys: NetworkKey[] = [];

  for (const entry of splitCsv(rawValue)) {
    const networkKey: NetworkKey = resolveNetworkKey(entry, 'ENABLED_NETWORKS');

    if (!networkKeys.includes(networkKey)) {
      networkKeys.push(networkKey);
    }
  }

  return networkKeys;
};

export const parseThresholdValue = (rawValue: string): INetworkThreshold | null => {
  const match: RegExpExecArray | null = THRESHOLD_VALUE_PATTERN.exec(rawValue.trim());

  if (match === null) {
    return null;
  }

  const value: number = Number.parseFloat(match[1] ?? '');

  if (!Number.isFinite(value) || value < 0) {
    return null;
  }

  const unit: ThresholdUnit =
    match[2]?.toLowerCase() === 'usd' ? ThresholdUnit.USD : ThresholdUnit.NATIVE;

  return { unit, value };
};

export const parseNetworkThresholds = (
  rawValue: string,
): ReadonlyMap<NetworkKey, INetworkThreshold> => {
  const thresholds: Map<NetworkKey, INetworkThreshold> = new Map<NetworkKey, INetworkThreshold>();

  for (const entry of splitCsv(rawValue)) {
    const [rawNetwork, rawThreshold] = splitAssignment(entry, 'NETWORK_THRESHOLDS');
    const networkKey: NetworkKey = resolveNetworkKey(rawNetwork, 'NETWORK_THRESHOLDS');
    const threshold: INetworkThreshold | null = parseThresholdValue(rawThreshold);

    if (threshold === null) {
      throw new Error(`NETWORK_THRESHOLDS entry "${entry}" has an invalid threshold value`);
    }

    thresholds.set(networkKey, threshold);
  }

  return thresholds;
};

export const parseSystemAddresses = (
  rawValue: string | undefined,
): ReadonlyMap<NetworkKey, readonly string[]> => {
  const addressesByNetwork: Map<NetworkKey, string[]> = new Map<NetworkKey, string[]>();

  if (!rawValue) {
    return addressesByNetwork;
  }

  for (const entry of splitCsv(rawValue)) {
    const [rawNetwork, address] = splitAssignment(entry, 'SYSTEM_ADDRESSES');
    const networkKey: NetworkKey = resolveNetworkKey(rawNetwork, 'SYSTEM_ADDRESSES');
    const addresses: string[] = addressesByNetwork.get(networkKey) ?? [];
    addresses.push(address);
    addressesByNetwork.set(networkKey, addresses);
  }

  return addressesByNetwork;
};
