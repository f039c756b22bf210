export type PointerState = {
  x: number;
  y: number;
  isDown: boolean;
  justPressed: boolean;
  justReleased: boolean;
};

/**
 * Collects pointer and keyboard input between frames. Key presses are queued
 * and drained once per frame by `consumeKeyPresses`, so a quick tap is never
 * lost between two updates.
 */
export class InputManager {
  private pressed: string[] = [];
  private pointer: PointerState = {
    x: 0,
    y: 0,
    isDown: false,
    justPressed: false,
    justReleased: false,
  };

  private keyDownHandler = (event: KeyboardEvent) => {
    if (!event.repeat) this.pressed.push(event.code);
  };

  private pointerDownHandler = (event: PointerEvent) => {
    this.pointer.isDown = true;
    this.pointer.justPressed = true;
    this.updatePointerPosition(event);
  };

  private pointerUpHandler = (event: PointerEvent) => {
    this.pointer.isDown = false;
    this.pointer.justReleased = true;
    this.updatePointerPosition(event);
  };

  private pointerMoveHandler = (event: PointerEvent) => {
    this.updatePointerPosition(event);
  };

  bind() {
    window.addEventListener("keydown", this.keyDownHandler);
    window.addEventListener("pointerdown", this.pointerDownHandler);
    window.addEventListener("pointerup", this.pointerUpHandler);
    window.addEventListener("pointermove", this.pointerMoveHandler);
  }

  unbind() {
    window.removeEventListener("keydown", this.keyDownHandler);
    window.removeEventListener("pointerdown", this.pointerDownHandler);
    window.removeEventListener("pointerup", this.pointerUpHandler);
    window.removeEventListener("pointermove", this.pointerMoveHandler);
    this.pressed = [];
  }

  updateFrame() {
    this.pointer.justPressed = false;
    this.pointer.justReleased = false;
  }

  consumeKeyPresses() {
    const pressed = this.pressed;
    this.pressed = [];
    return pressed;
  }

  getPointer() {
    return { ...this.pointer };
  }

  private updatePointerPosition(event: PointerEvent) {
    this.pointer.x = event.clientX;
    this.pointer.y = event.clientY;
  }
}
