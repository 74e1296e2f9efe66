/**
 * ClumpMeshBuilder — converts decoded clump geometry into Three.js meshes.
 *
 * Each GEOMETRY becomes one BufferGeometry with position, normal, uv (first
 * texture channel) and color (prelit RGBA) attributes. Triangles are grouped
 * by material id so a multi-material mesh can use an array of materials.
 */

import * as THREE from 'three';
import {
  collectGeometries,
  groupTrianglesByMaterial,
  type BsfChunk,
  type BsfGeometry,
  type BsfMaterial,
} from '@rwkit/bsf';

export class ClumpMeshBuilder {
  /**
   * Build one mesh per geometry in the clump, in file order.
   */
  static build(root: BsfChunk): THREE.Mesh[] {
    return collectGeometries(root).map((entry, i) => {
      const geometry = ClumpMeshBuilder.buildGeometry(entry.geometry);
      const materials = ClumpMeshBuilder.buildMaterials(entry.materials, entry.geometry.prelitColors.length > 0);
      const mesh = new THREE.Mesh(geometry, materials);
      mesh.name = `geometry_${i}`;
      return mesh;
    });
  }

  static buildGeometry(source: BsfGeometry): THREE.BufferGeometry {
    const geometry = new THREE.BufferGeometry();

    if (source.vertices.length > 0) {
      geometry.setAttribute('position', new THREE.BufferAttribute(source.vertices, 3));
    }
    if (source.normals.length > 0) {
      geometry.setAttribute('normal', new THREE.BufferAttribute(source.normals, 3));
    }
    const uv0 = source.texCoords[0];
    if (uv0 && uv0.length > 0) {
      geometry.setAttribute('uv', new THREE.BufferAttribute(uv0, 2));
    }
    if (source.prelitColors.length > 0) {
      // RGBA bytes, normalized to [0,1] on upload.
      geometry.setAttribute('color', new THREE.BufferAttribute(source.prelitColors, 4, true));
    }

    const indices = new Uint16Array(source.triangles.length * 3);
    let start = 0;
    for (const group of groupTrianglesByMaterial(source)) {
      indices.set(group.indices, start);
      geometry.addGroup(start, group.indices.length, group.materialId);
      start += group.indices.length;
    }
    if (indices.length > 0) {
      geometry.setIndex(new THREE.BufferAttribute(indices, 1));
    }

    const [cx, cy, cz] = source.boundingSphere.center;
    geometry.boundingSphere = new THREE.Sphere(new THREE.Vector3(cx, cy, cz), source.boundingSphere.radius);

    return geometry;
  }

  static buildMaterials(materials: BsfMaterial[], vertexColors: boolean): THREE.MeshStandardMaterial[] {
    if (materials.length === 0) {
      return [new THREE.MeshStandardMaterial({ vertexColors })];
    }
    return materials.map(({ color }) => {
      const material = new THREE.MeshStandardMaterial({ vertexColors });
      material.color.setRGB(color.r / 255, color.g / 255, color.b / 255);
      material.opacity = color.a / 255;
      material.transparent = color.a < 255;
      return material;
    });
  }
}
