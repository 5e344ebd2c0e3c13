/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import { type Contract } from 'fabric-contract-api';
import { EscrowFactoryContract } from './contracts/EscrowFactoryContract';
import { EscrowContract } from './contracts/EscrowContract';
import { OrderIntentContract } from './contracts/OrderIntentContract';
import { TokenContract } from './contracts/TokenContract';

export { EscrowFactoryContract } from './contracts/EscrowFactoryContract';
export { EscrowContract } from './contracts/EscrowContract';
export { OrderIntentContract } from './contracts/OrderIntentContract';
export { TokenContract } from './contracts/TokenContract';
export { EscrowError, isEscrowError } from './errors';
export type { ErrorCode, ErrorKind } from './errors';

export const contracts: typeof Contract[] = [
    EscrowFactoryContract,
    EscrowContract,
    OrderIntentContract,
    TokenContract,
];
