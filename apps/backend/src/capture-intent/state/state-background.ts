import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import { StateBase, type EventHandlerMap } from "../stateful/state-base";
import { emptyPreviewContext, type PreviewContext } from "./preview-context";
import { FinishingState } from "./state-finishing";
import { PreviewSetupState } from "./state-preview-setup";

/**
 * Module is not visible. Holds no hardware; remembers what the host says
 * about the preview surface so the next resume can start from it.
 */
export class BackgroundState extends StateBase {
  readonly name = "Background";

  private readonly preview: PreviewContext;

  protected readonly handlers: EventHandlerMap = {
    Resume: () =>
      new PreviewSetupState(this.stateMachine, this.resourceHandle, {
        preview: {
          ...emptyPreviewContext(),
          surface: this.preview.surface,
          layoutSize: this.preview.layoutSize,
        },
      }),
    SurfaceAvailable: (event) => {
      this.preview.surface = { ...event.surface };
      return this;
    },
    SurfaceDestroyed: () => {
      this.preview.surface = null;
      return this;
    },
    PreviewLayoutChanged: (event) => {
      this.preview.layoutSize = { ...event.size };
      return this;
    },
    CancelIntentTap: () =>
      new FinishingState(this.stateMachine, this.resourceHandle, {
        type: "Cancelled",
      }),
  };

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    preview: PreviewContext = emptyPreviewContext(),
  ) {
    super(stateMachine, resourceHandle);
    this.preview = { ...preview };
  }

  onEnter(): State {
    this.resources.moduleUI.setShutterButtonEnabled(false);
    return this;
  }
}
