import type { OpenedCamera } from "../camera/types";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import type { PreviewContext } from "./preview-context";
import { CapturingPhotoState } from "./state-capturing-photo";
import { CountdownState } from "./state-countdown";

/**
 * Next state after a shutter press: a countdown when the self timer is
 * set, otherwise capture right away.
 */
export function stateForShutter(
  stateMachine: StateMachine,
  resourceHandle: RefCountBase<ResourceConstructed>,
  cameraHandle: RefCountBase<OpenedCamera>,
  preview: PreviewContext,
  timerSeconds: number,
): State {
  if (timerSeconds > 0) {
    return new CountdownState(
      stateMachine,
      resourceHandle,
      cameraHandle,
      preview,
      timerSeconds,
    );
  }
  return new CapturingPhotoState(
    stateMachine,
    resourceHandle,
    cameraHandle,
    preview,
  );
}
