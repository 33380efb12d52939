export { Model, openModel } from "./Model";
export { Material, plyTypes, type PlyType, type EngineeringConstants } from "./Material";
export { Fabric } from "./Fabric";
export { Stackup, FabricWithAngle, symmetries, type Symmetry } from "./Stackup";
export { ElementSet } from "./ElementSet";
export { Rosette } from "./Rosette";
export { OrientedSelectionSet } from "./OrientedSelectionSet";
export { ModelingGroup } from "./ModelingGroup";
export { ModelingPly, type PlyMaterial } from "./ModelingPly";
export { ProductionPly } from "./ProductionPly";
export { AnalysisPly } from "./AnalysisPly";
export { type Vector3 } from "./vectors";
