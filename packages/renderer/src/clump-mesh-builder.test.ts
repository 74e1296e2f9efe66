import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { BsfParser, collectGeometries } from '@rwkit/bsf';
import { buildQuadClump } from '@rwkit/bsf/test-helpers';
import { ClumpMeshBuilder } from './clump-mesh-builder.js';

const root = BsfParser.parse(buildQuadClump());

describe('ClumpMeshBuilder', () => {
  describe('buildGeometry', () => {
    const source = collectGeometries(root)[0]!.geometry;
    const geometry = ClumpMeshBuilder.buildGeometry(source);

    it('copies vertex attributes', () => {
      expect(geometry.getAttribute('position').count).toBe(4);
      expect(geometry.getAttribute('normal').count).toBe(4);
      expect(geometry.getAttribute('uv').count).toBe(4);
      const color = geometry.getAttribute('color');
      expect(color.count).toBe(4);
      expect(color.itemSize).toBe(4);
      expect(color.normalized).toBe(true);
    });

    it('groups indices by material id', () => {
      expect(Array.from(geometry.getIndex()!.array)).toEqual([0, 1, 2, 0, 2, 3]);
      expect(geometry.groups).toEqual([
        { start: 0, count: 3, materialIndex: 0 },
        { start: 3, count: 3, materialIndex: 1 },
      ]);
    });

    it('uses the stored bounding sphere', () => {
      expect(geometry.boundingSphere!.center.toArray()).toEqual([0.5, 0.5, 0]);
      expect(geometry.boundingSphere!.radius).toBe(0.75);
    });
  });

  describe('build', () => {
    it('creates one mesh per geometry with one material per entry', () => {
      const meshes = ClumpMeshBuilder.build(root);
      expect(meshes).toHaveLength(1);
      const mesh = meshes[0]!;
      expect(mesh.name).toBe('geometry_0');
      const materials = Array.isArray(mesh.material)
        ? mesh.material.filter((m): m is THREE.MeshStandardMaterial => m instanceof THREE.MeshStandardMaterial)
        : [];
      expect(materials).toHaveLength(2);
      expect(materials[0]!.color.toArray()).toEqual([1, 0, 0]);
      expect(materials[1]!.color.toArray()).toEqual([0, 0, 1]);
      expect(materials[0]!.vertexColors).toBe(true);
      expect(materials[0]!.transparent).toBe(false);
    });

    it('falls back to a single default material', () => {
      const materials = ClumpMeshBuilder.buildMaterials([], false);
      expect(materials).toHaveLength(1);
      expect(materials[0]!.vertexColors).toBe(false);
    });
  });
});
