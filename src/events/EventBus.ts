import { EventEmitter } from "node:events"

import type { TaskweaveEvent } from "./types.js"

type EventHandler = (event: TaskweaveEvent) => void

const CHANNEL = "event"

export class EventBus {
    private readonly emitter = new EventEmitter()

    public on(handler: EventHandler): void {
        this.emitter.on(CHANNEL, handler)
    }

    public off(handler: EventHandler): void {
        this.emitter.off(CHANNEL, handler)
    }

    public emit(event: TaskweaveEvent): void {
        this.emitter.emit(CHANNEL, event)
    }

    public listenerCount(): number {
        return this.emitter.listenerCount(CHANNEL)
    }

    public removeAllListeners(): void {
        this.emitter.removeAllListeners(CHANNEL)
    }
}
