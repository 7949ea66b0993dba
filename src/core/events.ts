export type GachaEventMap = {
    rollStarted: { requestId: string; user: string };
    rollFulfilled: { requestId: string; user: string; beastId: number };
    tokenPurchased: { user: string; amount: bigint };
};

export type GachaEventName = keyof GachaEventMap;
export type GachaListener<K extends GachaEventName> = (payload: GachaEventMap[K]) => void;

/**
 * Notifications published once an operation has committed. A failing
 * listener is logged and does not affect the operation or other listeners.
 */
export class GachaEvents {
    private readonly listeners: { [K in GachaEventName]: Array<GachaListener<K>> } = {
        rollStarted: [],
        rollFulfilled: [],
        tokenPurchased: []
    };

    on<K extends GachaEventName>(event: K, listener: GachaListener<K>): () => void {
        this.listeners[event].push(listener);
        return () => {
            const list = this.listeners[event];
            const index = list.indexOf(listener);
            if (index >= 0) list.splice(index, 1);
        };
    }

    emit<K extends GachaEventName>(event: K, payload: GachaEventMap[K]): void {
        for (const listener of [...this.listeners[event]]) {
            try {
                listener(payload);
            } catch (error) {
                console.error(`Listener for ${event} failed:`, error);
            }
        }
    }
}
