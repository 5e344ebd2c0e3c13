import { FACTORY_ACCOUNT } from '../../src/config';
import { EscrowContract } from '../../src/contracts/EscrowContract';
import { EscrowFactoryContract } from '../../src/contracts/EscrowFactoryContract';
import { OrderIntentContract } from '../../src/contracts/OrderIntentContract';
import { TokenContract } from '../../src/contracts/TokenContract';
import { STANDARD_TEMPLATE } from '../../src/escrow/templates';
import { ChaincodeHarness } from './ChaincodeHarness';

export const ORDER_ID = 'ORDER_123';
export const PLATFORM_FEE_BIPS = 250; // 2.5%
export const RELEASE_AFTER = 7 * 24 * 60 * 60; // 7 days in seconds
export const METADATA_URI = 'ipfs://test-metadata';
export const ASSET = 'USDC';
export const AMOUNT = 100n * 10n ** 6n; // 100 USDC

export const OWNER = 'owner@org1';
export const ISSUER = 'issuer@org1';
export const PAYER = 'payer@org1';
export const PAYEE = 'payee@org2';
export const COLLECTOR = 'collector@org1';
export const ARBITRATOR = 'arbitrator@org3';
export const OTHER = 'other@org2';

export interface Deployment {
    chain: ChaincodeHarness;
    factory: EscrowFactoryContract;
    escrow: EscrowContract;
    token: TokenContract;
    intents: OrderIntentContract;
}

export async function deployEscrowFixture(): Promise<Deployment> {
    const chain = new ChaincodeHarness();
    const factory = new EscrowFactoryContract();
    const escrow = new EscrowContract();
    const token = new TokenContract();
    const intents = new OrderIntentContract();

    await chain.submit(token, ISSUER, (ctx) => token.RegisterAsset(ctx, ASSET, 'USDC', '6'));
    await chain.submit(token, ISSUER, (ctx) => token.Mint(ctx, ASSET, PAYER, (AMOUNT * 10n).toString()));
    await chain.submit(factory, OWNER, (ctx) =>
        factory.Initialize(ctx, STANDARD_TEMPLATE, COLLECTOR, ARBITRATOR, String(PLATFORM_FEE_BIPS)));

    return { chain, factory, escrow, token, intents };
}

export async function approveFactory(deployment: Deployment, amount: bigint, owner = PAYER): Promise<void> {
    const { chain, token } = deployment;
    await chain.submit(token, owner, (ctx) => token.Approve(ctx, ASSET, FACTORY_ACCOUNT, amount.toString()));
}

export async function createEscrow(deployment: Deployment, orderId = ORDER_ID, amount = AMOUNT): Promise<string> {
    const { chain, factory } = deployment;
    return chain.submit(factory, PAYER, (ctx) =>
        factory.CreateEscrow(ctx, orderId, PAYEE, ASSET, amount.toString(), METADATA_URI, String(RELEASE_AFTER)));
}

export async function deployWithFundedEscrowFixture(): Promise<Deployment & { handle: string }> {
    const deployment = await deployEscrowFixture();
    await approveFactory(deployment, AMOUNT);
    const handle = await createEscrow(deployment);
    return { ...deployment, handle };
}

export async function balanceOf(deployment: Deployment, account: string): Promise<bigint> {
    const { chain, token } = deployment;
    return BigInt(await chain.evaluate(account, (ctx) => token.BalanceOf(ctx, ASSET, account)));
}
