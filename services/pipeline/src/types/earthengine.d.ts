declare module '@google/earthengine' {
  namespace ee {
    type FailureCallback = (error: string) => void;

    interface ServiceAccountKey {
      client_email: string;
      private_key: string;
    }

    interface ComputedObject {
      evaluate(callback: (result: unknown, error?: string) => void): void;
    }

    interface Geometry extends ComputedObject {}

    interface Image extends ComputedObject {
      select(bands: string[]): Image;
      clip(geometry: Geometry): Image;
      getDownloadURL(params: DownloadParams, callback: (url: string | null, error?: string) => void): void;
    }

    interface ImageCollection extends ComputedObject {
      filterDate(start: string, end: string): ImageCollection;
      mean(): Image;
      size(): ComputedObject;
    }

    interface DownloadParams {
      region: Geometry;
      scale: number;
      format: 'GEO_TIFF';
      crs: string;
    }

    interface Api {
      data: {
        authenticateViaPrivateKey(
          privateKey: ServiceAccountKey,
          success: () => void,
          failure: FailureCallback,
          extraScopes?: string[]
        ): void;
      };
      initialize(baseUrl: string | null, tileUrl: string | null, success: () => void, failure: FailureCallback): void;
      Geometry(geoJson: { type: string; coordinates: unknown }): Geometry;
      ImageCollection(id: string): ImageCollection;
    }
  }

  const ee: ee.Api;
  export = ee;
}
