/**
 * PGA Module Exports
 *
 * Entity constructors, the join/meet/dual operators and the queries
 * that work on any entity.
 */

// Basis / grade model
export {
  BLADE_GRADES,
  DIMENSION,
  ENTITY_BLADES,
  SIGNATURE,
  doubleDualSign,
  gradeOf,
  isDegenerate,
  type BasisVector,
  type Blade,
} from "./basis";

// Constructors
export {
  DirectionUtils,
  HorizonUtils,
  LineDirectionUtils,
  LineMomentUtils,
  OriginUtils,
  PlaneDirectionUtils,
} from "./components";
export { PointUtils } from "./Point";
export { LineUtils } from "./Line";
export { PlaneUtils } from "./Plane";

// Decomposition and coordinates
export { bulk, bulkNorm, isComposite, weight, weightNorm } from "./bulkWeight";
export { coordinates, format, normSquared } from "./coordinates";

// Operators
export { negate, scale } from "./arithmetic";
export { dual } from "./dual";
export { join, joinPoints, type JoinOperand } from "./join";
export { meet, meetPlanes, type MeetOperand } from "./meet";
export {
  perpendicularLineThroughPoint,
  perpendicularPlaneThroughLine,
  perpendicularPlaneThroughPoint,
  projectLineOntoPlane,
  projectPlaneOntoPoint,
  projectPointOntoPlane,
} from "./projection";

// Queries
export {
  approxEq,
  isValid,
  isZero,
  norm,
  unitize,
  unitized,
  withTolerance,
  type Tolerance,
} from "./validity";

// Debugging
export {
  KernelDebugLogger,
  type KernelDebugLog,
  type KernelDebugReason,
  type KernelOperation,
} from "./KernelDebugLogger";
