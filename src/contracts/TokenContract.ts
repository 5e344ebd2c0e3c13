import { Info, Transaction } from 'fabric-contract-api';
import { Keys } from '../config';
import { EscrowError } from '../errors';
import { WorldStateAssetLedger } from '../ledger/AssetLedger';
import { EscrowContext } from '../ledger/EscrowContext';
import { isBlank } from '../ledger/WorldState';
import { Asset, AssetSchema } from '../models/Asset';
import { AmountArg, DecimalsArg, parseArg } from './args';
import { BaseContract } from './BaseContract';

/** Minimal fungible asset escrows are funded with. Not a general token ledger. */
@Info({ title: 'TokenContract', description: 'Register, mint and approve escrowable assets' })
export class TokenContract extends BaseContract {

    @Transaction()
    async RegisterAsset(ctx: EscrowContext, assetId: string, symbol: string, decimals: string): Promise<void> {
        if (isBlank(assetId)) throw new EscrowError('NULL_IDENTITY', 'Asset id cannot be empty');
        if (isBlank(symbol)) throw new EscrowError('INVALID_ARGUMENT', 'Asset symbol cannot be empty');

        const key = ctx.world.key(Keys.ASSET, assetId);
        if (await ctx.world.exists(key)) throw new EscrowError('ASSET_EXISTS', `Asset ${assetId} already exists`);

        const asset: Asset = {
            id: assetId,
            docType: 'asset',
            symbol,
            decimals: parseArg(DecimalsArg, decimals, 'INVALID_ARGUMENT', 'Decimals'),
            issuer: ctx.caller,
        };
        await ctx.world.put(key, asset);
        this.logger(ctx).info(`Asset ${assetId} registered by ${asset.issuer}`);
    }

    @Transaction()
    async Mint(ctx: EscrowContext, assetId: string, account: string, amount: string): Promise<void> {
        const asset = await this.readAsset(ctx, assetId);
        if (asset.issuer !== ctx.caller) throw new EscrowError('NOT_ISSUER', `Only the issuer can mint ${assetId}`);
        if (isBlank(account)) throw new EscrowError('NULL_IDENTITY', 'Mint recipient must be set');

        const value = parseArg(AmountArg, amount, 'INVALID_AMOUNT', 'Amount');
        if (value === 0n) throw new EscrowError('ZERO_AMOUNT', 'Mint amount must be greater than zero');

        await new WorldStateAssetLedger(ctx.world).mint(assetId, account, value);
        this.logger(ctx).info(`Minted ${value} ${asset.symbol} to ${account}`);
    }

    @Transaction()
    async Approve(ctx: EscrowContext, assetId: string, spender: string, amount: string): Promise<void> {
        await this.readAsset(ctx, assetId);
        if (isBlank(spender)) throw new EscrowError('NULL_IDENTITY', 'Spender must be set');

        const value = parseArg(AmountArg, amount, 'INVALID_AMOUNT', 'Amount');
        await new WorldStateAssetLedger(ctx.world).approve(assetId, ctx.caller, spender, value);
    }

    @Transaction(false)
    async ReadAsset(ctx: EscrowContext, assetId: string): Promise<string> {
        return this.toJSON(await this.readAsset(ctx, assetId));
    }

    @Transaction(false)
    async BalanceOf(ctx: EscrowContext, assetId: string, account: string): Promise<string> {
        return (await ctx.assets.balanceOf(assetId, account)).toString();
    }

    @Transaction(false)
    async Allowance(ctx: EscrowContext, assetId: string, owner: string, spender: string): Promise<string> {
        return (await ctx.assets.allowance(assetId, owner, spender)).toString();
    }

    private async readAsset(ctx: EscrowContext, assetId: string): Promise<Asset> {
        const asset = isBlank(assetId) ? undefined : await ctx.world.get(ctx.world.key(Keys.ASSET, assetId), AssetSchema);
        if (!asset) throw new EscrowError('UNKNOWN_ASSET', `Asset ${assetId} does not exist`);
        return asset;
    }
}
