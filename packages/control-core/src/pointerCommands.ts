import type { PointerCommand, PointerDriver } from "./types";

export function applyPointerCommand(driver: PointerDriver, command: PointerCommand): void {
  switch (command.type) {
    case "MOVE":
      driver.moveTo(command.x, command.y);
      break;
    case "BUTTON_DOWN":
      driver.mouseDown(command.button);
      break;
    case "BUTTON_UP":
      driver.mouseUp(command.button);
      break;
    case "CLICK":
      driver.click(command.button);
      break;
    case "DOUBLE_CLICK":
      driver.doubleClick();
      break;
    case "SCROLL":
      driver.scroll(command.amount);
      break;
    case "KEY_DOWN":
      driver.keyDown(command.key);
      break;
    case "KEY_UP":
      driver.keyUp(command.key);
      break;
    default:
      break;
  }
}
