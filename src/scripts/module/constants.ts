const CONSTANTS = {
    /**
     * The ID of the converter, used as the flag scope for provenance data.
     */
    MODULEID: "hero-sheet-converter",
    /**
     * The name of the converter, used as the log prefix.
     */
    MODULE_NAME: "Hero Converter",
    /**
     * The target game system. Also the flag scope the target system reads advancement selections from.
     */
    SYSTEM_ID: "draw-steel",
    /**
     * Versions stamped into `_stats` of synthesized items.
     */
    CORE_VERSION: "13.350",
    SYSTEM_VERSION: "0.8.1",
    /**
     * Image used for synthesized items and the actor itself.
     */
    DEFAULT_IMAGE: "icons/svg/mystery-man.svg",
    /**
     * Written wherever no narrative text could be resolved.
     */
    NO_DESCRIPTION: "No description available",
  } as const;

  export default CONSTANTS;
