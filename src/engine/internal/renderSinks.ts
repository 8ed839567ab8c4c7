import logger from "../../shared/utils/logger";
import type { RenderSink } from "../../types/render";

type SinkMethod = keyof RenderSink;

/**
 * Fans every render call out to each registered sink. A throwing sink is
 * logged and skipped so the others still update.
 */
export class CompositeRenderSink implements RenderSink {
  private readonly sinks: Set<RenderSink>;

  constructor(sinks: Iterable<RenderSink> = []) {
    this.sinks = new Set(sinks);
  }

  add(sink: RenderSink) {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  get size() {
    return this.sinks.size;
  }

  private dispatch(method: SinkMethod, call: (sink: RenderSink) => void) {
    this.sinks.forEach((sink) => {
      try {
        call(sink);
      } catch (error: unknown) {
        logger.error(`[RenderSinks] Error in ${method}:`, error);
      }
    });
  }

  onLevelUpdate(level: number) {
    this.dispatch("onLevelUpdate", (sink) => sink.onLevelUpdate(level));
  }

  onTalkStateChanged(talking: boolean) {
    this.dispatch("onTalkStateChanged", (sink) => sink.onTalkStateChanged(talking));
  }

  onVariantChanged(image: string | null) {
    this.dispatch("onVariantChanged", (sink) => sink.onVariantChanged(image));
  }

  onIdleFrameChanged(image: string | null) {
    this.dispatch("onIdleFrameChanged", (sink) => sink.onIdleFrameChanged(image));
  }

  onFault(message: string) {
    this.dispatch("onFault", (sink) => sink.onFault(message));
  }
}
