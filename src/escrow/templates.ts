import { EscrowError } from '../errors';
import { EscrowContext } from '../ledger/EscrowContext';
import { isBlank } from '../ledger/WorldState';
import { EscrowInit, EscrowOperations, EscrowRecord, EscrowRecordSchema } from '../models/Escrow';
import { EscrowInstance, escrowKey } from './EscrowInstance';

/** Shared behaviour new instances are cloned from. */
export interface EscrowTemplate {
    readonly ref: string;
    clone(ctx: EscrowContext, init: EscrowInit): Promise<EscrowOperations>;
    attach(ctx: EscrowContext, record: EscrowRecord): EscrowOperations;
}

export const STANDARD_TEMPLATE = 'standard-escrow@1';

const standardEscrow: EscrowTemplate = {
    ref: STANDARD_TEMPLATE,
    clone: (ctx, init) => EscrowInstance.open(ctx, STANDARD_TEMPLATE, init),
    attach: (ctx, record) => new EscrowInstance(ctx, record),
};

const templates = new Map<string, EscrowTemplate>([[standardEscrow.ref, standardEscrow]]);

export function resolveTemplate(ref: string): EscrowTemplate {
    const template = templates.get(ref);
    if (!template) throw new EscrowError('UNKNOWN_TEMPLATE', `No escrow template named ${ref}`);
    return template;
}

export async function findInstance(ctx: EscrowContext, handle: string): Promise<EscrowOperations | undefined> {
    if (isBlank(handle)) return undefined;
    const record = await ctx.world.get(escrowKey(ctx, handle), EscrowRecordSchema);
    return record && resolveTemplate(record.template).attach(ctx, record);
}

export async function loadInstance(ctx: EscrowContext, handle: string): Promise<EscrowOperations> {
    const instance = await findInstance(ctx, handle);
    if (!instance) throw new EscrowError('UNKNOWN_ESCROW', `Escrow ${handle} does not exist`);
    return instance;
}
