import { errorMessage } from "../errors.js";
import type {
  Command,
  DrawCircleCommand,
  DrawLineCommand,
  DrawRectangleCommand,
  MoveCommand,
  SetColorCommand,
} from "../types/command.js";
import type { DrawingSurface } from "../types/surface.js";
import { DEFAULT_COLOR, resolveColor } from "./colors.js";

export interface ExecutorOptions {
  /** Stroke width handed to every surface call. Default 2. */
  strokeWidth?: number;
}

export interface InterpreterState {
  currentColor: string;
  penX: number;
  penY: number;
  penDown: boolean;
  fillMode: boolean;
}

const DEFAULT_STROKE_WIDTH = 2;

/** Surfaces take integer pixels; the DSL allows decimals. */
function px(value: number): number {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot convert ${value} to a pixel coordinate`);
  }
  return Math.trunc(value);
}

/**
 * Stateful interpreter for one drawing session. Owns the pen and the
 * surface handle; commands run strictly in the order they are given.
 */
export class Executor {
  private readonly state: InterpreterState;
  private readonly strokeWidth: number;

  constructor(
    private readonly surface: DrawingSurface,
    options: ExecutorOptions = {},
  ) {
    this.strokeWidth = options.strokeWidth ?? DEFAULT_STROKE_WIDTH;
    this.state = {
      currentColor: DEFAULT_COLOR,
      penX: Math.floor(surface.width / 2),
      penY: Math.floor(surface.height / 2),
      penDown: true,
      // Nothing in the language sets this yet; shapes are always outlines.
      fillMode: false,
    };
  }

  /** Snapshot of the interpreter state. */
  getState(): Readonly<InterpreterState> {
    return { ...this.state };
  }

  /**
   * Run one command and describe what happened. Never throws: a fault is
   * returned as an error message and the session stays usable.
   */
  execute(command: Command): string {
    try {
      return this.dispatch(command);
    } catch (err) {
      return `Error executing command: ${errorMessage(err)}`;
    }
  }

  private dispatch(command: Command): string {
    switch (command.kind) {
      case "draw-line":
        return this.drawLine(command);
      case "draw-circle":
        return this.drawCircle(command);
      case "draw-rectangle":
        return this.drawRectangle(command);
      case "set-color":
        return this.setColor(command);
      case "clear":
        this.surface.clearAll();
        return "Canvas cleared";
      case "move":
        return this.move(command);
      case "pen-up":
        this.state.penDown = false;
        return "Pen lifted";
      case "pen-down":
        this.state.penDown = true;
        return "Pen lowered";
    }
  }

  private drawLine(command: DrawLineCommand): string {
    const x1 = px(command.x1);
    const y1 = px(command.y1);
    const x2 = px(command.x2);
    const y2 = px(command.y2);

    this.surface.drawLine(
      x1,
      y1,
      x2,
      y2,
      this.state.currentColor,
      this.strokeWidth,
    );
    if (this.state.penDown) this.placePen(x2, y2);

    return `Drew line from (${x1}, ${y1}) to (${x2}, ${y2})`;
  }

  private drawCircle(command: DrawCircleCommand): string {
    const x = px(command.x);
    const y = px(command.y);
    const r = px(command.radius);

    this.surface.drawEllipse(
      { x1: x - r, y1: y - r, x2: x + r, y2: y + r },
      this.state.currentColor,
      this.fillColor(),
      this.strokeWidth,
    );
    if (this.state.penDown) this.placePen(x, y);

    return `Drew circle at (${x}, ${y}) with radius ${r}`;
  }

  /** (x, y) is the top-left corner; the pen lands on the bottom-right. */
  private drawRectangle(command: DrawRectangleCommand): string {
    const x = px(command.x);
    const y = px(command.y);
    const width = px(command.width);
    const height = px(command.height);
    const box = { x1: x, y1: y, x2: x + width, y2: y + height };

    this.surface.drawRectangle(
      box,
      this.state.currentColor,
      this.fillColor(),
      this.strokeWidth,
    );
    if (this.state.penDown) this.placePen(box.x2, box.y2);

    return `Drew rectangle at (${x}, ${y}) with size ${width}x${height}`;
  }

  private setColor(command: SetColorCommand): string {
    this.state.currentColor = resolveColor(command.name);
    return `Color set to ${command.name}`;
  }

  private move(command: MoveCommand): string {
    const x = px(command.x);
    const y = px(command.y);

    if (this.state.penDown) {
      this.surface.drawLine(
        this.state.penX,
        this.state.penY,
        x,
        y,
        this.state.currentColor,
        this.strokeWidth,
      );
    }
    this.placePen(x, y);

    return `Pen moved to (${x}, ${y})`;
  }

  private fillColor(): string | null {
    return this.state.fillMode ? this.state.currentColor : null;
  }

  private placePen(x: number, y: number): void {
    this.state.penX = x;
    this.state.penY = y;
  }
}
