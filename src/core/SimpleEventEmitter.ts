/**
 * SimpleEventEmitter - 타입이 있는 이벤트 발행/구독
 *
 * 이벤트 이름 → 페이로드 타입 맵을 제네릭으로 받습니다.
 * 핸들러에서 난 예외는 로그만 남기고 다른 핸들러 실행은 계속됩니다.
 */

type EventHandler<T> = (payload: T) => void;

/**
 * @template Events - 이벤트 이름과 페이로드 타입의 맵
 *
 * @example
 * ```ts
 * interface RunEvents {
 *   result: { datasetId: string };
 *   error: { datasetId: string; error: Error };
 * }
 *
 * const emitter = new SimpleEventEmitter<RunEvents>();
 * const off = emitter.on('result', ({ datasetId }) => console.log(datasetId));
 * emitter.emit('result', { datasetId: 'pathways' });
 * off();
 * ```
 */
export class SimpleEventEmitter<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<EventHandler<Events[K]>> } = {};

  /**
   * 이벤트 구독
   *
   * @returns 구독 해제 함수
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const handlers = this.listeners[event] ?? new Set<EventHandler<Events[K]>>();
    handlers.add(handler);
    this.listeners[event] = handlers;

    return () => {
      handlers.delete(handler);
      if (handlers.size === 0 && this.listeners[event] === handlers) {
        delete this.listeners[event];
      }
    };
  }

  /**
   * 이벤트 발행
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[SimpleEventEmitter] Handler error for "${String(event)}":`, error);
      }
    }
  }

  /**
   * 리스너 수
   */
  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  /**
   * 모든 리스너 제거
   */
  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
  }
}
