/**
 * Builds Three.js meshes from a RigModel.
 */

import * as THREE from 'three'
import type { PayloadBox, RigModel, SlingLeg, Vec3 } from '../model/types'
import { HOOK_WIDTH, HOOK_HEIGHT } from '../model/rig'

// Sling leg cross-section (m), drawn thicker than a real cable for visibility
export const SLING_THICKNESS = 0.03

/** Wind arrow length per newton of drag (m/N) */
export const WIND_ARROW_SCALE = 1 / 200
export const WIND_ARROW_MIN = 0.5
export const WIND_ARROW_MAX = 5

const MAT: Record<'payload' | 'hook' | 'sling', THREE.MeshLambertMaterial> = {
  payload: new THREE.MeshLambertMaterial({ color: 0xd98c1f }),
  hook:    new THREE.MeshLambertMaterial({ color: 0x3a3a3a }),
  sling:   new THREE.MeshLambertMaterial({ color: 0x1f5fa8 }),
}

const WIND_COLOR = 0x2a9d8f

export function buildRigMeshes(rig: RigModel): THREE.Group {
  const group = new THREE.Group()
  group.name = 'lift-rig'

  group.add(payloadMesh(rig.payload))
  group.add(hookMesh(rig))
  for (const s of rig.slings) group.add(slingMesh(s))
  group.add(windArrow(rig))

  return group
}

/** three.js Object JSON, loadable with ObjectLoader or the three.js editor. */
export function rigSceneJson(rig: RigModel): ReturnType<THREE.Group['toJSON']> {
  return buildRigMeshes(rig).toJSON()
}

export function windArrowLength(windForce: number): number {
  return Math.min(Math.max(windForce * WIND_ARROW_SCALE, WIND_ARROW_MIN), WIND_ARROW_MAX)
}

// ── Per-element mesh builders ─────────────────────────────────────────────────

function payloadMesh(p: PayloadBox): THREE.Mesh {
  const geo = new THREE.BoxGeometry(p.length, p.height, p.width)
  const mesh = new THREE.Mesh(geo, MAT.payload)
  mesh.name = 'payload'
  mesh.position.set(p.center.x, p.center.y, p.center.z)
  mesh.castShadow = true
  mesh.receiveShadow = true
  return mesh
}

function hookMesh(rig: RigModel): THREE.Mesh {
  const geo = new THREE.BoxGeometry(HOOK_WIDTH, HOOK_HEIGHT, HOOK_WIDTH)
  const mesh = new THREE.Mesh(geo, MAT.hook)
  mesh.name = 'hook'
  mesh.position.set(rig.hookCenter.x, rig.hookCenter.y, rig.hookCenter.z)
  mesh.castShadow = true
  return mesh
}

const LOCAL_Z = new THREE.Vector3(0, 0, 1)

/** Mesh centred between two points with its local Z axis running from `start` to `end`. */
function memberBetween(start: Vec3, end: Vec3, geo: THREE.BufferGeometry, mat: THREE.Material): THREE.Mesh {
  const a = new THREE.Vector3(start.x, start.y, start.z)
  const b = new THREE.Vector3(end.x, end.y, end.z)
  const mesh = new THREE.Mesh(geo, mat)
  mesh.position.addVectors(a, b).multiplyScalar(0.5)
  mesh.quaternion.setFromUnitVectors(LOCAL_Z, b.sub(a).normalize())
  return mesh
}

function slingMesh(s: SlingLeg): THREE.Mesh {
  const geo = new THREE.BoxGeometry(SLING_THICKNESS, SLING_THICKNESS, s.length)
  const mesh = memberBetween(s.start, s.end, geo, MAT.sling)
  mesh.name = 'sling'
  mesh.castShadow = true
  return mesh
}

/** Horizontal arrow along +X ending at the payload's windward face. */
function windArrow(rig: RigModel): THREE.ArrowHelper {
  const length = windArrowLength(rig.windForce)
  const { center, length: payloadLength } = rig.payload
  const origin = new THREE.Vector3(center.x - payloadLength / 2 - length, center.y, center.z)
  const arrow = new THREE.ArrowHelper(new THREE.Vector3(1, 0, 0), origin, length, WIND_COLOR)
  arrow.name = 'wind'
  return arrow
}
