import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { z } from 'zod';
import { GachaError, isGachaError, type GachaErrorKind } from '../errors.js';
import type { GachaServices } from '../services.js';

declare global {
    namespace Express {
        interface Request {
            userId?: string;
        }
    }
}

const STATUS_BY_KIND: Record<GachaErrorKind, number> = {
    validation: 400,
    state_conflict: 409,
    insufficient_funds: 402,
    external_transfer: 502,
    oracle: 503,
    unauthorized: 403
};

export function statusForError(error: GachaError): number {
    return STATUS_BY_KIND[error.kind];
}

const AmountString = z.string().regex(/^\d+$/, 'expected a non-negative integer string').transform((v) => BigInt(v));

export const PurchaseBodySchema = z.object({
    amount: AmountString,
    payment: AmountString
});

export const QuoteQuerySchema = z.object({
    amount: AmountString
});

function sendError(res: express.Response, label: string, error: unknown): void {
    if (isGachaError(error)) {
        res.status(statusForError(error)).json({ error: error.message, code: error.code });
        return;
    }
    if (error instanceof z.ZodError) {
        res.status(400).json({ error: 'Invalid request', issues: error.issues.map((i) => i.message) });
        return;
    }
    console.error(`${label} error:`, error);
    res.status(500).json({ error: 'Internal server error' });
}

function requireUser(req: express.Request, res: express.Response, next: express.NextFunction) {
    const userId = req.header('x-user-id')?.trim();
    if (!userId) {
        return res.status(401).json({ error: 'Missing x-user-id header' });
    }
    req.userId = userId;
    next();
}

function userOf(req: express.Request): string {
    if (!req.userId) throw new GachaError('UNAUTHORIZED', 'request carries no user');
    return req.userId;
}

export function createApp(services: GachaServices, corsOrigins: string[] = []): express.Express {
    const { engine, shop, ledger, registry } = services;
    const app = express();

    app.use(helmet());
    app.use(cors({ origin: corsOrigins, credentials: false }));
    app.use(express.json());

    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.get('/api/quote', async (req, res) => {
        try {
            const { amount } = QuoteQuerySchema.parse(req.query);
            const cost = await shop.quote(amount);
            res.json({ amount: amount.toString(), cost: cost.toString() });
        } catch (error) {
            sendError(res, 'Quote', error);
        }
    });

    app.post('/api/purchase', requireUser, async (req, res) => {
        try {
            const { amount, payment } = PurchaseBodySchema.parse(req.body);
            const receipt = await shop.purchase(userOf(req), amount, payment);
            res.json({
                user: receipt.user,
                amount: receipt.amount.toString(),
                paid: receipt.paid.toString(),
                refund: receipt.refund.toString(),
                balance: ledger.balanceOf(receipt.user).toString()
            });
        } catch (error) {
            sendError(res, 'Purchase', error);
        }
    });

    // Value sent without a purchase is never accepted
    app.post('/api/pay', requireUser, (req, res) => {
        try {
            shop.receiveDirectPayment(userOf(req), String(req.body?.value ?? ''));
        } catch (error) {
            sendError(res, 'Payment', error);
        }
    });

    app.get('/api/balance', requireUser, (req, res) => {
        try {
            const user = userOf(req);
            res.json({
                user,
                balance: ledger.balanceOf(user).toString(),
                rollState: engine.rollStateOf(user),
                requestId: engine.pendingRequestOf(user)?.requestId ?? null,
                rollPrice: engine.rollPrice.toString()
            });
        } catch (error) {
            sendError(res, 'Balance', error);
        }
    });

    app.post('/api/roll', requireUser, (req, res) => {
        try {
            const ticket = engine.initiateRoll(userOf(req));
            res.status(202).json({ requestId: ticket.requestId, user: ticket.user, price: ticket.price.toString() });
        } catch (error) {
            sendError(res, 'Roll', error);
        }
    });

    app.get('/api/beasts', requireUser, (req, res) => {
        try {
            res.json(registry.beastsOf(userOf(req)));
        } catch (error) {
            sendError(res, 'Beasts', error);
        }
    });

    app.get('/api/beasts/:id', (req, res) => {
        const id = /^\d+$/.test(req.params.id) ? Number(req.params.id) : Number.NaN;
        const metadata = Number.isSafeInteger(id) ? registry.metadata(id) : undefined;
        if (!metadata) {
            return res.status(404).json({ error: 'Beast not found' });
        }
        res.json({ id, owner: registry.ownerOf(id), ...metadata });
    });

    // 404 handler - always JSON
    app.use((req, res) => {
        res.status(404).json({ error: 'Not found' });
    });

    return app;
}
