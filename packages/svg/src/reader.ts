import { DOMParser, type Element, type Node } from "@xmldom/xmldom";
import {
  ParseError,
  UnsupportedElement,
  type AffineMatrix,
  type PathCommand,
  type PathOutline,
  type Point
} from "@gpsart/domain";
import { parsePathData } from "./path-data.js";
import {
  IDENTITY_MATRIX,
  isIdentityMatrix,
  multiplyMatrices,
  parseTransformList
} from "./transform-attribute.js";

const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
const ELEMENT_NODE = 1;

const CONTAINER_ELEMENTS = new Set(["svg", "g", "a", "switch"]);
const NON_RENDERED_ELEMENTS = new Set([
  "defs",
  "title",
  "desc",
  "metadata",
  "style",
  "script",
  "symbol",
  "clipPath",
  "mask",
  "marker",
  "pattern",
  "filter",
  "linearGradient",
  "radialGradient"
]);

const COORDINATE_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/g;
const SEPARATORS_ONLY = /^[\s,]*$/;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function tagName(element: Element): string {
  return element.localName ?? element.nodeName;
}

function decodeSource(source: string | Uint8Array) {
  return typeof source === "string" ? source : new TextDecoder("utf-8").decode(source);
}

function notWellFormed(message: string) {
  return new ParseError(`Drawing is not well-formed XML: ${message.trim()}`);
}

function parseDocument(text: string) {
  const parser = new DOMParser({
    onError: (level, message) => {
      // Warnings (unknown entities, missing doctype) do not affect the outlines.
      if (level !== "warning") {
        throw notWellFormed(message);
      }
    }
  });
  try {
    return parser.parseFromString(text, "image/svg+xml");
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    throw notWellFormed(error instanceof Error ? error.message : String(error));
  }
}

function attribute(element: Element, name: string) {
  const value = element.getAttribute(name)?.trim();
  return value ? value : undefined;
}

function lengthAttribute(element: Element, name: string) {
  const raw = attribute(element, name);
  if (raw === undefined) {
    return 0;
  }
  const value = Number(raw.replace(/px$/, ""));
  if (!Number.isFinite(value)) {
    throw new ParseError(`<${tagName(element)}> has a non-numeric ${name} '${raw}'.`);
  }
  return value;
}

function pointsAttribute(element: Element): Point[] {
  const raw = attribute(element, "points") ?? "";
  if (!SEPARATORS_ONLY.test(raw.replace(COORDINATE_PATTERN, " "))) {
    throw new ParseError(`<${tagName(element)}> has a malformed points list '${raw}'.`);
  }
  const values = (raw.match(COORDINATE_PATTERN) ?? []).map(Number);
  if (values.length % 2 !== 0) {
    throw new ParseError(`<${tagName(element)}> has an odd number of coordinates.`);
  }
  const points: Point[] = [];
  for (let i = 0; i < values.length; i += 2) {
    points.push({ x: values[i], y: values[i + 1] });
  }
  return points;
}

function polylineCommands(points: Point[], closed: boolean): PathCommand[] {
  if (points.length < 2) {
    return [];
  }
  const [first, ...rest] = points;
  const commands: PathCommand[] = [
    { type: "move", to: first },
    ...rest.map((to): PathCommand => ({ type: "line", to }))
  ];
  return closed ? [...commands, { type: "close" }] : commands;
}

function elementOutlines(element: Element): PathOutline[] {
  switch (tagName(element)) {
    case "path": {
      const data = attribute(element, "d");
      if (data === undefined) {
        throw new ParseError("<path> element has no path data.");
      }
      return parsePathData(data);
    }
    case "line": {
      const commands = polylineCommands(
        [
          { x: lengthAttribute(element, "x1"), y: lengthAttribute(element, "y1") },
          { x: lengthAttribute(element, "x2"), y: lengthAttribute(element, "y2") }
        ],
        false
      );
      return [{ commands }];
    }
    case "polyline":
    case "polygon": {
      const commands = polylineCommands(pointsAttribute(element), tagName(element) === "polygon");
      return commands.length ? [{ commands }] : [];
    }
    default:
      throw new UnsupportedElement(tagName(element));
  }
}

function collectOutlines(element: Element, inherited: AffineMatrix, outlines: PathOutline[]) {
  if (element.namespaceURI && element.namespaceURI !== SVG_NAMESPACE) {
    return;
  }
  const name = tagName(element);
  if (NON_RENDERED_ELEMENTS.has(name)) {
    return;
  }

  const own = attribute(element, "transform");
  const matrix = own ? multiplyMatrices(inherited, parseTransformList(own)) : inherited;

  if (CONTAINER_ELEMENTS.has(name)) {
    const children = element.childNodes;
    for (let i = 0; i < children.length; i += 1) {
      const child = children.item(i);
      if (child && isElement(child)) {
        collectOutlines(child, matrix, outlines);
      }
    }
    return;
  }

  for (const outline of elementOutlines(element)) {
    outlines.push(isIdentityMatrix(matrix) ? outline : { ...outline, transform: matrix });
  }
}

/**
 * Reads every path outline of an SVG drawing in document order.
 *
 * Coordinates stay in the drawing's own user space, y growing downward.
 */
export function readSvgDrawing(source: string | Uint8Array): PathOutline[] {
  const doc = parseDocument(decodeSource(source));
  const root = doc.documentElement;
  if (!root || tagName(root) !== "svg") {
    throw new ParseError("Drawing root element must be <svg>.");
  }

  const outlines: PathOutline[] = [];
  collectOutlines(root, IDENTITY_MATRIX, outlines);
  return outlines;
}
