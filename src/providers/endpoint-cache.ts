import type { EndpointMode } from "./types.js";

/**
 * 모델별 엔드포인트 판별 결과. 모델당 한 번 기록되고 이후 읽기만 한다.
 * 전역 상태 대신 프로바이더 인스턴스가 소유한다.
 */
export class EndpointModeCache {
  private readonly modes = new Map<string, EndpointMode>();

  get(model: string): EndpointMode | null {
    return this.modes.get(model) ?? null;
  }

  has(model: string): boolean {
    return this.modes.has(model);
  }

  /** 이미 기록된 모델은 덮어쓰지 않고 기존 값을 돌려준다. */
  remember(model: string, mode: EndpointMode): EndpointMode {
    const existing = this.modes.get(model);
    if (existing) return existing;
    this.modes.set(model, mode);
    return mode;
  }
}
