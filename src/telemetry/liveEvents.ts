export interface LiveEventMessage {
    type: string;
    payload: Record<string, unknown>;
    timestamp: string;
}

type LiveEventListener = (event: LiveEventMessage) => void;

const listeners = new Set<LiveEventListener>();

// Un listener che lancia viene rimosso e segnalato su stderr: gli altri ricevono comunque l'evento.
export function publishLiveEvent(type: string, payload: Record<string, unknown> = {}): void {
    const event: LiveEventMessage = {
        type,
        payload,
        timestamp: new Date().toISOString(),
    };

    for (const listener of listeners) {
        try {
            listener(event);
        } catch (error) {
            listeners.delete(listener);
            console.error('[ERROR] live_events.listener_failed', {
                type,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}

export function subscribeLiveEvents(listener: LiveEventListener): () => void {
    listeners.add(listener);
    return () => {
        listeners.delete(listener);
    };
}

export function getLiveEventSubscribersCount(): number {
    return listeners.size;
}
