import { ParseError, type PathCommand, type PathOutline, type Point } from "@gpsart/domain";

const NUMBER_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const SEPARATOR_PATTERN = /[\s,]*/y;
const COMMAND_LETTERS = new Set("MmLlHhVvCcSsQqTtAaZz".split(""));

class PathDataScanner {
  private offset = 0;

  constructor(private readonly source: string) {}

  get position() {
    return this.offset;
  }

  skipSeparators() {
    SEPARATOR_PATTERN.lastIndex = this.offset;
    SEPARATOR_PATTERN.exec(this.source);
    this.offset = SEPARATOR_PATTERN.lastIndex;
  }

  atEnd() {
    this.skipSeparators();
    return this.offset >= this.source.length;
  }

  numberAhead() {
    this.skipSeparators();
    NUMBER_PATTERN.lastIndex = this.offset;
    return NUMBER_PATTERN.test(this.source);
  }

  readCommand(): string {
    this.skipSeparators();
    const letter = this.source[this.offset];
    if (letter === undefined || !COMMAND_LETTERS.has(letter)) {
      throw new ParseError(`Expected a path command at offset ${this.offset}.`);
    }
    this.offset += 1;
    return letter;
  }

  readNumber(): number {
    this.skipSeparators();
    NUMBER_PATTERN.lastIndex = this.offset;
    const match = NUMBER_PATTERN.exec(this.source);
    if (!match) {
      throw new ParseError(`Expected a number at offset ${this.offset}.`);
    }
    const value = Number(match[0]);
    if (!Number.isFinite(value)) {
      throw new ParseError(`Number out of range at offset ${this.offset}.`);
    }
    this.offset = NUMBER_PATTERN.lastIndex;
    return value;
  }

  readFlag(): boolean {
    this.skipSeparators();
    const flag = this.source[this.offset];
    if (flag !== "0" && flag !== "1") {
      throw new ParseError(`Expected an arc flag at offset ${this.offset}.`);
    }
    this.offset += 1;
    return flag === "1";
  }
}

type PreviousCurve = { kind: "cubic" | "quadratic"; control: Point } | undefined;

function reflect(control: Point, about: Point): Point {
  return { x: 2 * about.x - control.x, y: 2 * about.y - control.y };
}

/**
 * Parses SVG path data into absolute-coordinate outlines, one per subpath.
 * Subpaths that never draw anything after their move are dropped.
 */
export function parsePathData(data: string): PathOutline[] {
  const scanner = new PathDataScanner(data);
  const outlines: PathOutline[] = [];
  let commands: PathCommand[] = [];
  let current: Point = { x: 0, y: 0 };
  let subpathStart: Point = { x: 0, y: 0 };
  let hasCurrentPoint = false;
  let startsNewSubpath = false;
  let previous: PreviousCurve;

  const flush = () => {
    if (commands.length > 1) {
      outlines.push({ commands });
    }
    commands = [];
  };

  const resolve = (relative: boolean, x: number, y: number): Point =>
    relative ? { x: current.x + x, y: current.y + y } : { x, y };

  const beginDrawing = () => {
    if (startsNewSubpath) {
      commands.push({ type: "move", to: subpathStart });
      startsNewSubpath = false;
    }
  };

  while (!scanner.atEnd()) {
    const offset = scanner.position;
    const letter = scanner.readCommand();
    const command = letter.toLowerCase();
    const relative = letter !== letter.toUpperCase();

    if (!hasCurrentPoint && command !== "m") {
      throw new ParseError(
        `Path data must start with a move command, found '${letter}' at offset ${offset}.`
      );
    }

    if (command === "z") {
      beginDrawing();
      commands.push({ type: "close" });
      current = subpathStart;
      previous = undefined;
      flush();
      startsNewSubpath = true;
      continue;
    }

    let first = true;
    do {
      switch (command) {
        case "m": {
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          if (first) {
            flush();
            startsNewSubpath = false;
            commands.push({ type: "move", to });
            subpathStart = to;
            hasCurrentPoint = true;
          } else {
            commands.push({ type: "line", to });
          }
          current = to;
          previous = undefined;
          break;
        }
        case "l": {
          beginDrawing();
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          commands.push({ type: "line", to });
          current = to;
          previous = undefined;
          break;
        }
        case "h": {
          beginDrawing();
          const value = scanner.readNumber();
          const to = { x: relative ? current.x + value : value, y: current.y };
          commands.push({ type: "line", to });
          current = to;
          previous = undefined;
          break;
        }
        case "v": {
          beginDrawing();
          const value = scanner.readNumber();
          const to = { x: current.x, y: relative ? current.y + value : value };
          commands.push({ type: "line", to });
          current = to;
          previous = undefined;
          break;
        }
        case "c": {
          beginDrawing();
          const control1 = resolve(relative, scanner.readNumber(), scanner.readNumber());
          const control2 = resolve(relative, scanner.readNumber(), scanner.readNumber());
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          commands.push({ type: "cubic", control1, control2, to });
          current = to;
          previous = { kind: "cubic", control: control2 };
          break;
        }
        case "s": {
          beginDrawing();
          const control1 =
            previous?.kind === "cubic" ? reflect(previous.control, current) : current;
          const control2 = resolve(relative, scanner.readNumber(), scanner.readNumber());
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          commands.push({ type: "cubic", control1, control2, to });
          current = to;
          previous = { kind: "cubic", control: control2 };
          break;
        }
        case "q": {
          beginDrawing();
          const control = resolve(relative, scanner.readNumber(), scanner.readNumber());
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          commands.push({ type: "quadratic", control, to });
          current = to;
          previous = { kind: "quadratic", control };
          break;
        }
        case "t": {
          beginDrawing();
          const control =
            previous?.kind === "quadratic" ? reflect(previous.control, current) : current;
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          commands.push({ type: "quadratic", control, to });
          current = to;
          previous = { kind: "quadratic", control };
          break;
        }
        case "a": {
          beginDrawing();
          const rx = Math.abs(scanner.readNumber());
          const ry = Math.abs(scanner.readNumber());
          const xAxisRotation = scanner.readNumber();
          const largeArc = scanner.readFlag();
          const sweep = scanner.readFlag();
          const to = resolve(relative, scanner.readNumber(), scanner.readNumber());
          commands.push({ type: "arc", rx, ry, xAxisRotation, largeArc, sweep, to });
          current = to;
          previous = undefined;
          break;
        }
        default:
          throw new ParseError(`Unsupported path command '${letter}' at offset ${offset}.`);
      }
      first = false;
    } while (scanner.numberAhead());
  }

  flush();
  return outlines;
}
