import { z } from 'zod';
import { FACTORY_ACCOUNT, Keys } from '../config';
import { EscrowError } from '../errors';
import { EscrowContext } from '../ledger/EscrowContext';
import { isBlank } from '../ledger/WorldState';
import { EscrowOperations, EscrowStatus, Principal } from '../models/Escrow';
import { EscrowRequest, FactoryConfig, FactoryConfigSchema, FactoryStats, StatusCounts } from '../models/Factory';
import { IntentStatus } from '../models/Order';
import { OrderIntentRegistry } from '../orders/OrderIntentRegistry';
import { AggregateCounters } from './AggregateCounters';
import { isValidFeeBips } from './fees';
import { findInstance, loadInstance, resolveTemplate } from './templates';

export interface FactorySettings {
    template: string;
    feeCollector: Principal;
    arbitrator: Principal;
    defaultFeeBips: number;
}

const Handle = z.string().min(1);

export function escrowHandle(orderId: string): string {
    return `ESCROW_${orderId}`;
}

/**
 * Mints escrow instances, routes dispute resolution to them and keeps the
 * global counters. One factory lives in the world state of the chaincode.
 */
export class EscrowFactory {
    private readonly counters: AggregateCounters;

    constructor(private readonly ctx: EscrowContext) {
        this.counters = new AggregateCounters(ctx.world);
    }

    async initialize(owner: Principal, settings: FactorySettings): Promise<FactoryConfig> {
        if (await this.ctx.world.exists(this.configKey())) {
            throw new EscrowError('ALREADY_INITIALIZED', 'The escrow factory is already initialized');
        }
        resolveTemplate(settings.template);
        requireIdentity(settings.feeCollector, 'fee collector');
        requireIdentity(settings.arbitrator, 'arbitrator');
        requireFeeBips(settings.defaultFeeBips);

        const config: FactoryConfig = {
            docType: 'factory',
            owner,
            template: settings.template,
            account: FACTORY_ACCOUNT,
            feeCollector: settings.feeCollector,
            arbitrator: settings.arbitrator,
            defaultFeeBips: settings.defaultFeeBips,
        };
        await this.saveConfig(config);
        return config;
    }

    async config(): Promise<FactoryConfig> {
        const config = await this.ctx.world.get(this.configKey(), FactoryConfigSchema);
        if (!config) throw new EscrowError('NOT_INITIALIZED', 'The escrow factory has not been initialized');
        return config;
    }

    /** Clones, funds and registers a new instance in one step. Returns its handle. */
    async createEscrow(payer: Principal, request: EscrowRequest): Promise<string> {
        const config = await this.config();
        const { orderId, payee, asset, amount, metadata, releaseDelay } = request;

        if (isBlank(orderId)) throw new EscrowError('EMPTY_ORDER_ID', 'Order id cannot be empty');
        requireIdentity(payee, 'payee');
        requireIdentity(asset, 'asset');
        if (amount <= 0n) throw new EscrowError('ZERO_AMOUNT', 'Escrow amount must be greater than zero');
        if (!Number.isSafeInteger(releaseDelay) || releaseDelay < 0) {
            throw new EscrowError('INVALID_DELAY', `Release delay ${releaseDelay} is not a whole number of seconds`);
        }
        if (!Number.isSafeInteger(this.ctx.now + releaseDelay)) {
            throw new EscrowError('INVALID_DELAY', `Release delay ${releaseDelay} runs past the last representable time`);
        }
        if (await this.ctx.world.exists(this.orderKey(orderId))) {
            throw new EscrowError('ORDER_EXISTS', `Order ${orderId} already has an escrow`);
        }

        const allowance = await this.ctx.assets.allowance(asset, payer, config.account);
        if (allowance < amount) {
            throw new EscrowError('INSUFFICIENT_ALLOWANCE', `Factory may spend ${allowance} of ${asset}, needs ${amount}`);
        }
        const balance = await this.ctx.assets.balanceOf(asset, payer);
        if (balance < amount) {
            throw new EscrowError('INSUFFICIENT_BALANCE', `Payer holds ${balance} of ${asset}, needs ${amount}`);
        }

        const handle = escrowHandle(orderId);
        await this.ctx.assets.transferFrom(asset, config.account, payer, handle, amount);
        await resolveTemplate(config.template).clone(this.ctx, {
            handle,
            factory: config.account,
            orderId,
            payer,
            payee,
            asset,
            amount,
            metadata,
            releaseDelay,
            feeBips: config.defaultFeeBips,
            feeCollector: config.feeCollector,
        });

        await this.ctx.world.put(this.orderKey(orderId), handle);
        await this.counters.recordCreation(handle, payer, payee, amount);

        this.ctx.emit('EscrowCreated', { instance: handle, orderId, payer, payee, asset, amount: amount.toString() });
        return handle;
    }

    /** Funds the escrow a pending order intent describes and marks the intent paid. */
    async createEscrowFromIntent(payer: Principal, orderId: string): Promise<string> {
        const intents = new OrderIntentRegistry(this.ctx);
        const intent = await intents.intentOf(orderId);
        if (intent.status !== IntentStatus.PENDING) {
            throw new EscrowError('INTENT_ALREADY_PROCESSED', `Order ${orderId} is already ${intent.status}`);
        }

        const handle = await this.createEscrow(payer, {
            orderId,
            payee: intent.receiver,
            asset: intent.asset,
            amount: BigInt(intent.amount),
            metadata: intent.metadata,
            releaseDelay: intent.releaseDelay,
        });
        await intents.markPaid(orderId, payer, handle);
        return handle;
    }

    async resolveDispute(caller: Principal, handle: string, winner: Principal): Promise<void> {
        const config = await this.config();
        if (caller !== config.arbitrator) {
            throw new EscrowError('NOT_ARBITRATOR', 'Only the arbitrator can resolve disputes');
        }
        const instance = await this.ownInstance(handle, config);

        const prior = instance.status;
        await instance.resolveDispute(config.account, winner);
        await this.counters.moveStatus(prior, EscrowStatus.RESOLVED);
    }

    async setFeeCollector(caller: Principal, feeCollector: Principal): Promise<void> {
        const config = await this.governedConfig(caller);
        requireIdentity(feeCollector, 'fee collector');
        await this.saveConfig({ ...config, feeCollector });
        this.ctx.emit('FeeCollectorUpdated', { newCollector: feeCollector });
    }

    async setArbitrator(caller: Principal, arbitrator: Principal): Promise<void> {
        const config = await this.governedConfig(caller);
        requireIdentity(arbitrator, 'arbitrator');
        await this.saveConfig({ ...config, arbitrator });
        this.ctx.emit('ArbitratorUpdated', { newArbitrator: arbitrator });
    }

    /** New rate applies to instances created afterwards; existing ones keep their snapshot. */
    async setDefaultFeeBips(caller: Principal, defaultFeeBips: number): Promise<void> {
        const config = await this.governedConfig(caller);
        requireFeeBips(defaultFeeBips);
        await this.saveConfig({ ...config, defaultFeeBips });
        this.ctx.emit('PlatformFeeUpdated', { newFeeBips: defaultFeeBips });
    }

    async transferOwnership(caller: Principal, newOwner: Principal): Promise<void> {
        const config = await this.governedConfig(caller);
        requireIdentity(newOwner, 'owner');
        await this.saveConfig({ ...config, owner: newOwner });
        this.ctx.emit('OwnershipTransferred', { previousOwner: config.owner, newOwner });
    }

    async escrowOf(orderId: string): Promise<string | undefined> {
        if (isBlank(orderId)) return undefined;
        return this.ctx.world.get(this.orderKey(orderId), Handle);
    }

    async isKnownEscrow(handle: string): Promise<boolean> {
        const config = await this.config();
        const instance = await findInstance(this.ctx, handle);
        return instance !== undefined && instance.record().factory === config.account;
    }

    async stats(): Promise<FactoryStats> {
        const config = await this.config();
        return {
            totalEscrows: await this.counters.totalEscrows(),
            totalVolume: (await this.counters.totalVolume()).toString(),
            feeBips: config.defaultFeeBips,
            feeCollector: config.feeCollector,
            arbitrator: config.arbitrator,
        };
    }

    async statusCounts(): Promise<StatusCounts> {
        return this.counters.statusCounts();
    }

    async totalEscrows(): Promise<number> {
        return this.counters.totalEscrows();
    }

    async participantCount(participant: Principal): Promise<number> {
        return this.counters.participantCount(participant);
    }

    async allEscrows(): Promise<string[]> {
        return this.counters.handles();
    }

    // Linear scans over every instance; fine until the instance count gets large.
    async escrowsOf(participant: Principal): Promise<string[]> {
        return this.scan((instance) => {
            const { payer, payee } = instance.record();
            return payer === participant || payee === participant;
        });
    }

    async escrowsByStatus(status: EscrowStatus): Promise<string[]> {
        return this.scan((instance) => instance.status === status);
    }

    private async scan(matches: (instance: EscrowOperations) => boolean): Promise<string[]> {
        const found: string[] = [];
        for (const handle of await this.counters.handles()) {
            const instance = await loadInstance(this.ctx, handle);
            if (matches(instance)) found.push(handle);
        }
        return found;
    }

    private async ownInstance(handle: string, config: FactoryConfig): Promise<EscrowOperations> {
        const instance = await findInstance(this.ctx, handle);
        if (!instance || instance.record().factory !== config.account) {
            throw new EscrowError('UNKNOWN_ESCROW', `Escrow ${handle} was not created by this factory`);
        }
        return instance;
    }

    private async governedConfig(caller: Principal): Promise<FactoryConfig> {
        const config = await this.config();
        if (caller !== config.owner) {
            throw new EscrowError('NOT_OWNER', 'Only the factory owner can change its settings');
        }
        return config;
    }

    private async saveConfig(config: FactoryConfig): Promise<void> {
        await this.ctx.world.put(this.configKey(), config);
    }

    private configKey(): string {
        return this.ctx.world.key(Keys.FACTORY, 'config');
    }

    private orderKey(orderId: string): string {
        return this.ctx.world.key(Keys.ORDER, orderId);
    }
}

function requireIdentity(value: string, role: string): void {
    if (isBlank(value)) {
        throw new EscrowError('NULL_IDENTITY', `The ${role} must be set`);
    }
}

function requireFeeBips(feeBips: number): void {
    if (!isValidFeeBips(feeBips)) {
        throw new EscrowError('FEE_OUT_OF_RANGE', `Fee of ${feeBips} bips is outside [0, 10000)`);
    }
}
