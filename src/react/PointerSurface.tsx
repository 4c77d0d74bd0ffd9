"use client";

import { useEffect, useRef, type ReactNode } from "react";
import { attachDomWindow } from "../adapters/dom";
import type { PointerEventListener, PointerListener } from "../dispatch/PointerEvents";
import type { PointerEventsManager } from "../dispatch/PointerEventsManager";

type PointerHandlers = {
    onPointerDown?: PointerEventListener;
    onPointerMove?: PointerEventListener;
    onPointerUp?: PointerEventListener;
    onPointerCancel?: PointerEventListener;
    onPointerUpdate?: PointerEventListener;
};

export type PointerSurfaceProps = PointerHandlers & {
    manager: PointerEventsManager;
    /** Window id used for the element; generated when omitted. */
    windowId?: string;
    className?: string;
    children?: ReactNode;
};

export function PointerSurface({ manager, windowId, className, children, ...handlers }: PointerSurfaceProps) {
    const containerRef = useRef<HTMLDivElement | null>(null);
    const handlersRef = useRef<PointerHandlers>(handlers);
    handlersRef.current = handlers;

    useEffect(() => {
        const element = containerRef.current;
        if (!element) return;

        const { window: hostWindow, detach } = attachDomWindow(element, { id: windowId });
        const events = manager.eventsForWindow(hostWindow);
        const listener: PointerListener = {
            onPointerDown: (e) => handlersRef.current.onPointerDown?.(e),
            onPointerMove: (e) => handlersRef.current.onPointerMove?.(e),
            onPointerUp: (e) => handlersRef.current.onPointerUp?.(e),
            onPointerCancel: (e) => handlersRef.current.onPointerCancel?.(e),
            onPointerUpdate: (e) => handlersRef.current.onPointerUpdate?.(e),
        };
        events.registerPointerEvents(listener);

        return () => {
            events.unregisterPointerEvents(listener);
            manager.removeWindow(hostWindow);
            detach();
        };
    }, [manager, windowId]);

    return (
        <div ref={containerRef} className={className}>
            {children}
        </div>
    );
}
